/**
 * Phone Ranking
 * Filter by budget and brand, score every candidate against catalog-wide maxima,
 * then keep the top N. Equal scores keep their candidate order.
 */

import type PhoneRecord from "../../../models/phone.model";
import type { CatalogMaxima } from "../../../models/phone.model";
import type { PreferenceContext } from "../../../models/preference.model";
import type { ScoredPhone } from "../../../models/recommendation.model";
import { TOP_RECOMMENDATIONS } from "../../../config/recommendation.config";
import { CandidateFilter } from "../filtering/CandidateFilter";
import { PhoneScorer } from "../scoring/PhoneScorer";
import { CatalogStats } from "../utils/CatalogStats";

export interface RankingOutcome {
    ranked: ScoredPhone[];
    candidateCount: number;
}

export class PhoneRanker {

    static rank(
        catalog: PhoneRecord[],
        context: PreferenceContext,
        maxima: CatalogMaxima = CatalogStats.computeMaxima(catalog),
        limit: number = TOP_RECOMMENDATIONS
    ): RankingOutcome {
        const { budgetMin, budgetMax, priority, brandFilter } = context;
        const candidates = CandidateFilter.buildCandidateSet(catalog, budgetMin, budgetMax, brandFilter);

        const ranked = candidates
            .map((phone, index) => {
                const breakdown = PhoneScorer.evaluate(phone, priority, budgetMin, budgetMax, maxima);
                return { phone: { ...phone, score: breakdown.score, breakdown }, index };
            })
            .sort((a, b) => {
                if (b.phone.score !== a.phone.score) return b.phone.score - a.phone.score;
                return a.index - b.index;
            })
            .slice(0, Math.max(0, limit))
            .map(x => x.phone);

        return { ranked, candidateCount: candidates.length };
    }

    static recommend(
        catalog: PhoneRecord[],
        context: PreferenceContext,
        maxima?: CatalogMaxima,
        limit?: number
    ): ScoredPhone[] {
        return this.rank(catalog, context, maxima, limit).ranked;
    }
}
