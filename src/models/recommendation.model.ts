import type PhoneRecord from "./phone.model";

interface ScoreBreakdown {
    budget: number;
    performance: number;
    battery: number;
    camera: number;
    rawScore: number;
    multiplier: number;
    score: number;
}

interface ScoredPhone extends PhoneRecord {
    score: number;
    breakdown: ScoreBreakdown;
}

interface RecommendationResult {
    recommendations: ScoredPhone[];
    candidateCount: number;
    noMatches: boolean;
}

// Row shape rendered by the results table
interface RecommendationTableRow {
    brand: string | null;
    model: string;
    price: number | null;
    ram: number | null;
    battery: number | null;
    camera: string | null;
    score: number;
}

export type { ScoreBreakdown, ScoredPhone, RecommendationResult, RecommendationTableRow };
