/**
 * Phone Scoring
 * Additive budget/performance/battery/camera terms, then a single priority multiplier.
 */

import type PhoneRecord from "../../../models/phone.model";
import type { CatalogMaxima } from "../../../models/phone.model";
import type { Priority } from "../../../models/preference.model";
import type { ScoreBreakdown } from "../../../models/recommendation.model";
import { PRIORITY_MULTIPLIERS, SCORING_WEIGHTS } from "../../../config/recommendation.config";
import { SpecParser } from "../utils/SpecParser";

export class PhoneScorer {

    static budgetTerm(price: number | null, budgetMin: number, budgetMax: number): number {
        if (price !== null && budgetMin <= price && price <= budgetMax) {
            return SCORING_WEIGHTS.budgetMatch;
        }
        return SCORING_WEIGHTS.budgetPenalty;
    }

    static performanceTerm(ram: number | null, maxRam: number | null): number {
        return this.normalized(ram, maxRam) * SCORING_WEIGHTS.performance;
    }

    static batteryTerm(battery: number | null, maxBattery: number | null): number {
        return this.normalized(battery, maxBattery) * SCORING_WEIGHTS.battery;
    }

    static cameraTerm(camera: unknown): number {
        const average = SpecParser.averageCameraMegapixels(camera);
        return average === null ? 0 : average / SCORING_WEIGHTS.cameraDivisor;
    }

    static priorityMultiplier(priority: Priority): number {
        return PRIORITY_MULTIPLIERS[priority];
    }

    static evaluate(
        phone: PhoneRecord,
        priority: Priority,
        budgetMin: number,
        budgetMax: number,
        maxima: CatalogMaxima
    ): ScoreBreakdown {
        const budget = this.budgetTerm(phone.price, budgetMin, budgetMax);
        const performance = this.performanceTerm(phone.ram, maxima.maxRam);
        const battery = this.batteryTerm(phone.battery, maxima.maxBattery);
        const camera = this.cameraTerm(phone.camera);

        const rawScore = budget + performance + battery + camera;
        const multiplier = this.priorityMultiplier(priority);

        return { budget, performance, battery, camera, rawScore, multiplier, score: rawScore * multiplier };
    }

    static score(
        phone: PhoneRecord,
        priority: Priority,
        budgetMin: number,
        budgetMax: number,
        maxima: CatalogMaxima
    ): number {
        return this.evaluate(phone, priority, budgetMin, budgetMax, maxima).score;
    }

    // value / max, or 0 when either side is missing or the max is degenerate
    private static normalized(value: number | null, max: number | null): number {
        if (value === null || max === null || !(max > 0)) return 0;
        return value / max;
    }
}
