import type { Request, Response } from "express";
import ValidationService from "../services/helper.service";
import RecommendationService from "../services/recommendation.service";
import PresentationService, { MATCHES_MESSAGE, NO_MATCHES_MESSAGE } from "../services/presentation.service";
import ChatService from "../services/chat.service";
import { sendFailure, sendSuccess } from "./response.helper";

class RecommendationController {
    static async findPhones(req: Request, res: Response) {
        try {
            const context = ValidationService.assertPreferenceContext(req.body);
            const result = await RecommendationService.getRecommendations(context);

            return sendSuccess(res, result.noMatches ? NO_MATCHES_MESSAGE : MATCHES_MESSAGE, {
                recommendations: result.recommendations.map(p => PresentationService.toTableRow(p)),
                lines: result.recommendations.map(p => PresentationService.toMarkdownBlock(p)),
                breakdowns: result.recommendations.map(p => p.breakdown),
                candidateCount: result.candidateCount,
                noMatches: result.noMatches
            });
        } catch (error) {
            return sendFailure(res, error);
        }
    }

    static async chat(req: Request, res: Response) {
        try {
            const body: unknown = req.body;
            if (!ValidationService.validateBody(body, ["message"]) || !ValidationService.isRecord(body) || typeof body.message !== "string") {
                return res.status(400).json({
                    success: false,
                    message: "Please type a message",
                    data: null
                });
            }
            const context = ValidationService.assertPreferenceContext(body);
            const response = await ChatService.respond(body.message.trim(), context);

            return sendSuccess(res, "Chat reply generated", response);
        } catch (error) {
            return sendFailure(res, error);
        }
    }
}

export default RecommendationController;
