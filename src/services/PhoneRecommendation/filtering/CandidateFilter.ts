import type PhoneRecord from "../../../models/phone.model";

export class CandidateFilter {

    static withinBudget(phones: PhoneRecord[], budgetMin: number, budgetMax: number): PhoneRecord[] {
        return phones.filter(p => p.price !== null && p.price >= budgetMin && p.price <= budgetMax);
    }

    // Empty filter keeps every brand; phones without a brand never match a non-empty filter
    static byBrand(phones: PhoneRecord[], brandFilter: readonly string[]): PhoneRecord[] {
        if (brandFilter.length === 0) return phones;
        const allowed = new Set(brandFilter);
        return phones.filter(p => p.brand !== null && allowed.has(p.brand));
    }

    static buildCandidateSet(
        phones: PhoneRecord[],
        budgetMin: number,
        budgetMax: number,
        brandFilter: readonly string[]
    ): PhoneRecord[] {
        return this.byBrand(this.withinBudget(phones, budgetMin, budgetMax), brandFilter);
    }
}
