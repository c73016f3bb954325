import type { ChatResponse } from "../models/chat.model";
import type { PreferenceContext } from "../models/preference.model";
import PresentationService from "./presentation.service";
import RecommendationService from "./recommendation.service";

class ChatService {
    // The message is echoed into the transcript only; the ranking comes from the current preferences
    static async respond(message: string, context: PreferenceContext): Promise<ChatResponse> {
        const { recommendations } = await RecommendationService.getRecommendations(context);
        const reply = PresentationService.toChatReply(recommendations);

        return {
            reply,
            messages: [
                { role: "user", content: message },
                { role: "assistant", content: reply }
            ]
        };
    }
}

export default ChatService;
