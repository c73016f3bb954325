import { BUDGET_SLIDER, DEFAULT_PRIORITY, PRIORITIES } from "../config/recommendation.config";
import type { PreferenceContext, Priority } from "../models/preference.model";
import { PreferenceValidationError } from "../models/errors.model";

type PreferenceParseResult =
    | { isValid: true; context: PreferenceContext }
    | { isValid: false; errors: string[] };

class ValidationService {

    static isRecord(value: unknown): value is Record<string, unknown> {
        return typeof value === "object" && value !== null && !Array.isArray(value);
    }

    static validateBody(data: unknown, requiredFields: string[]): boolean {
        if (!this.isRecord(data)) return false;
        for (const field of requiredFields) {
            const value = data[field];
            if (value === undefined || value === null || (typeof value === "string" && value.trim() === "")) {
                return false;
            }
        }
        return true;
    }

    static isPriority(value: unknown): value is Priority {
        return typeof value === "string" && PRIORITIES.some(p => p === value);
    }

    // Accepts numbers and numeric strings ("15000"); anything else is undefined
    static toNumber(value: unknown): number | undefined {
        if (typeof value === "number") return Number.isFinite(value) ? value : undefined;
        if (typeof value === "string" && value.trim() !== "") {
            const n = Number(value.trim());
            return Number.isFinite(n) ? n : undefined;
        }
        return undefined;
    }

    // ["Samsung", "Apple"] or "Samsung, Apple"
    static toBrandList(value: unknown): string[] | undefined {
        if (value === undefined || value === null) return [];
        if (typeof value === "string") {
            return this.deduplicate(value.split(",").map(s => s.trim()).filter(Boolean));
        }
        if (Array.isArray(value) && value.every((v): v is string => typeof v === "string")) {
            return this.deduplicate(value.map(v => v.trim()).filter(Boolean));
        }
        return undefined;
    }

    static deduplicate(values: string[]): string[] {
        return [...new Set(values)];
    }

    static parsePreferenceContext(body: unknown): PreferenceParseResult {
        const data: Record<string, unknown> = this.isRecord(body) ? body : {};
        const errors: string[] = [];

        const [defaultMin, defaultMax] = BUDGET_SLIDER.defaultRange;
        const budgetMin = data.budgetMin === undefined ? defaultMin : this.toNumber(data.budgetMin);
        const budgetMax = data.budgetMax === undefined ? defaultMax : this.toNumber(data.budgetMax);

        if (budgetMin === undefined || budgetMin < 0) {
            errors.push("budgetMin must be a non-negative number");
        }
        if (budgetMax === undefined || budgetMax < 0) {
            errors.push("budgetMax must be a non-negative number");
        }
        if (budgetMin !== undefined && budgetMax !== undefined && budgetMin > budgetMax) {
            errors.push("budgetMin cannot be greater than budgetMax");
        }

        let priority: Priority = DEFAULT_PRIORITY;
        if (data.priority !== undefined) {
            if (this.isPriority(data.priority)) {
                priority = data.priority;
            } else {
                errors.push(`priority must be one of: ${PRIORITIES.join(", ")}`);
            }
        }

        const brandFilter = this.toBrandList(data.brands);
        if (brandFilter === undefined) {
            errors.push("brands must be a list of brand names");
        }

        const requirement = data.requirement;
        if (requirement !== undefined && typeof requirement !== "string") {
            errors.push("requirement must be text");
        }

        if (errors.length > 0 || budgetMin === undefined || budgetMax === undefined || brandFilter === undefined) {
            return { isValid: false, errors };
        }

        const context: PreferenceContext = { budgetMin, budgetMax, priority, brandFilter };
        if (typeof requirement === "string" && requirement.trim()) {
            context.requirement = requirement.trim();
        }
        return { isValid: true, context };
    }

    static assertPreferenceContext(body: unknown): PreferenceContext {
        const result = this.parsePreferenceContext(body);
        if (!result.isValid) {
            throw new PreferenceValidationError(result.errors);
        }
        return result.context;
    }
}

export default ValidationService;
