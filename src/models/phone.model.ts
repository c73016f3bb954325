interface PhoneRecord {
    brand: string | null;
    model: string;
    price: number | null;
    ram: number | null;
    battery: number | null;
    camera: string | null;
}

interface CatalogMaxima {
    maxRam: number | null;
    maxBattery: number | null;
}

interface Catalog {
    phones: PhoneRecord[];
    maxima: CatalogMaxima;
    brands: string[];
    loadedAt: Date;
    source: string;
}

interface CatalogStats {
    isLoaded: boolean;
    phonesCount: number;
    brandsCount: number;
    maxRam: number | null;
    maxBattery: number | null;
    loadedAt: Date | null;
    ageMinutes: number | null;
    source: string | null;
}

export default PhoneRecord;
export type { CatalogMaxima, Catalog, CatalogStats };
