import type PhoneRecord from "../../../models/phone.model";
import type { CatalogMaxima } from "../../../models/phone.model";

export class CatalogStats {

    // Computed once over the full catalog so scores stay comparable across filters
    static computeMaxima(phones: PhoneRecord[]): CatalogMaxima {
        return {
            maxRam: this.maxOf(phones.map(p => p.ram)),
            maxBattery: this.maxOf(phones.map(p => p.battery))
        };
    }

    static distinctBrands(phones: PhoneRecord[]): string[] {
        const brands = new Set<string>();
        for (const phone of phones) {
            if (phone.brand) brands.add(phone.brand);
        }
        return [...brands].sort();
    }

    private static maxOf(values: Array<number | null>): number | null {
        let max: number | null = null;
        for (const v of values) {
            if (v === null || !Number.isFinite(v)) continue;
            if (max === null || v > max) max = v;
        }
        return max;
    }
}
