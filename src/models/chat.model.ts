interface ChatMessage {
    role: "user" | "assistant";
    content: string;
}

interface ChatResponse {
    reply: string;
    messages: ChatMessage[];
}

export type { ChatMessage, ChatResponse };
