/**
 * Spec Parsing Utilities
 * Coerces the mixed-format text of the catalog CSV into typed phone fields.
 * Every parser returns null (or an empty list) instead of throwing.
 */

const CURRENCY_AND_SEPARATORS = /[₹$€£,\s]/g;
const FIRST_INTEGER = /(\d+)/;
const LEADING_NUMBER = /^\d+(?:\.\d+)?/;
const PLAIN_DECIMAL = /^\d+(?:\.\d+)?$/;

export class SpecParser {

    // "₹1,23,999" -> 123999
    static parsePrice(raw: unknown): number | null {
        if (typeof raw === "number") {
            return Number.isFinite(raw) && raw >= 0 ? raw : null;
        }
        if (typeof raw !== "string") return null;

        const cleaned = raw.replace(CURRENCY_AND_SEPARATORS, "");
        if (!PLAIN_DECIMAL.test(cleaned)) return null;

        const value = parseFloat(cleaned);
        return Number.isFinite(value) ? value : null;
    }

    // "8 GB RAM, 128 GB inbuilt" -> 8
    static extractFirstInteger(raw: unknown): number | null {
        if (typeof raw === "number") {
            return Number.isFinite(raw) ? raw : null;
        }
        if (typeof raw !== "string") return null;

        const m = raw.match(FIRST_INTEGER);
        return m && m[1] ? parseFloat(m[1]) : null;
    }

    static deriveBrand(model: unknown): string | null {
        if (typeof model !== "string") return null;
        const first = model.trim().split(/\s+/)[0];
        return first ? first : null;
    }

    /**
     * Megapixel values of each lens in "50MP+8MP+2MP".
     * Segments without a leading number are skipped.
     */
    static parseCameraMegapixels(raw: unknown): number[] {
        if (typeof raw !== "string") return [];

        const values: number[] = [];
        for (const segment of raw.split("+")) {
            const beforeUnit = (segment.split("MP")[0] ?? "").trim();
            const m = beforeUnit.match(LEADING_NUMBER);
            if (!m) continue;
            const value = parseFloat(m[0]);
            if (Number.isFinite(value)) values.push(value);
        }
        return values;
    }

    static averageCameraMegapixels(raw: unknown): number | null {
        const values = this.parseCameraMegapixels(raw);
        if (values.length === 0) return null;
        return values.reduce((sum, v) => sum + v, 0) / values.length;
    }

    static cleanText(raw: unknown): string | null {
        if (typeof raw !== "string") return null;
        const trimmed = raw.trim();
        return trimmed ? trimmed : null;
    }
}
