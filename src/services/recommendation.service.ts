import type { PreferenceContext } from "../models/preference.model";
import type { RecommendationResult } from "../models/recommendation.model";
import AppConfig from "../config/app.config";
import CatalogService from "./catalog.service";
import { PhoneRanker } from "./PhoneRecommendation/ranking/PhoneRanker";

/**
 * Single entry point into the ranking pipeline: filter -> score -> sort -> top 3.
 * The submit flow and the chat flow both go through getRecommendations.
 */
class RecommendationService {

    static async getRecommendations(context: PreferenceContext): Promise<RecommendationResult> {
        const catalog = await CatalogService.load();
        const { ranked, candidateCount } = PhoneRanker.rank(catalog.phones, context, catalog.maxima);

        if (AppConfig.isDebug) {
            console.log("Recommendation run:", {
                priority: context.priority,
                budget: [context.budgetMin, context.budgetMax],
                brands: context.brandFilter,
                candidates: candidateCount,
                returned: ranked.length
            });
        }

        return {
            recommendations: ranked,
            candidateCount,
            noMatches: ranked.length === 0
        };
    }
}

export default RecommendationService;
