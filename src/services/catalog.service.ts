import fs from "fs";
import * as Papa from "papaparse";
import AppConfig from "../config/app.config";
import { CATALOG_COLUMN_ALIASES, CATALOG_FIELDS } from "../config/recommendation.config";
import type { CatalogField } from "../config/recommendation.config";
import type PhoneRecord from "../models/phone.model";
import type { Catalog, CatalogStats as CatalogStatsModel } from "../models/phone.model";
import { CatalogLoadError, CatalogNotLoadedError, getErrorMessage } from "../models/errors.model";
import { CatalogStats } from "./PhoneRecommendation/utils/CatalogStats";
import { SpecParser } from "./PhoneRecommendation/utils/SpecParser";

type CsvRow = Record<string, string | undefined>;

/**
 * Catalog Service - loads the phone CSV once per process and serves it read-only.
 * Concurrent first callers share one in-flight load; a failed load is not cached.
 */
class CatalogService {
    private static catalog: Catalog | null = null;
    private static pending: Promise<Catalog> | null = null;
    // Bumped on teardown so a load started before it cannot repopulate the cache
    private static generation = 0;

    static async load(): Promise<Catalog> {
        if (this.catalog) {
            return this.catalog;
        }
        if (!this.pending) {
            const generation = this.generation;
            const pending: Promise<Catalog> = this.fetchCatalog()
                .then(catalog => {
                    if (generation === this.generation) {
                        this.catalog = catalog;
                    }
                    return catalog;
                })
                .finally(() => {
                    if (this.pending === pending) {
                        this.pending = null;
                    }
                });
            this.pending = pending;
        }
        return this.pending;
    }

    static getCatalog(): Catalog {
        if (!this.catalog) {
            throw new CatalogNotLoadedError();
        }
        return this.catalog;
    }

    static isLoaded(): boolean {
        return this.catalog !== null;
    }

    static teardown(): void {
        if (this.catalog) {
            console.log(`Phone catalog released (${this.catalog.phones.length} phones)`);
        }
        this.generation++;
        this.catalog = null;
        this.pending = null;
    }

    static getStats(): CatalogStatsModel {
        const catalog = this.catalog;
        if (!catalog) {
            return {
                isLoaded: false,
                phonesCount: 0,
                brandsCount: 0,
                maxRam: null,
                maxBattery: null,
                loadedAt: null,
                ageMinutes: null,
                source: null
            };
        }
        const age = Date.now() - catalog.loadedAt.getTime();
        return {
            isLoaded: true,
            phonesCount: catalog.phones.length,
            brandsCount: catalog.brands.length,
            maxRam: catalog.maxima.maxRam,
            maxBattery: catalog.maxima.maxBattery,
            loadedAt: catalog.loadedAt,
            ageMinutes: Math.round(age / 1000 / 60),
            source: catalog.source
        };
    }

    static buildCatalog(phones: PhoneRecord[], source: string): Catalog {
        return {
            phones,
            maxima: CatalogStats.computeMaxima(phones),
            brands: CatalogStats.distinctBrands(phones),
            loadedAt: new Date(),
            source
        };
    }

    static parseCsv(text: string, source: string = "inline"): PhoneRecord[] {
        const result = Papa.parse<CsvRow>(text, {
            header: true,
            delimiter: ",",
            skipEmptyLines: "greedy",
            transformHeader: (header: string) => header.trim().toLowerCase()
        });

        const headers = result.meta.fields ?? [];
        const columns = this.resolveColumns(headers);
        if (!columns.model) {
            throw new CatalogLoadError(`Catalog at ${source} has no model column (found: ${headers.join(", ")})`, source);
        }

        if (result.errors.length > 0) {
            console.warn(`Catalog CSV had ${result.errors.length} malformed row(s); keeping parsed fields`);
            if (AppConfig.isDebug) {
                result.errors.forEach(e => console.warn(`  row ${e.row ?? "?"}: ${e.message}`));
            }
        }

        return result.data.map(row => this.toPhoneRecord(row, columns));
    }

    private static resolveColumns(headers: string[]): Partial<Record<CatalogField, string>> {
        const columns: Partial<Record<CatalogField, string>> = {};
        for (const field of CATALOG_FIELDS) {
            const match = CATALOG_COLUMN_ALIASES[field].find(alias => headers.includes(alias));
            if (match) columns[field] = match;
        }
        return columns;
    }

    private static toPhoneRecord(row: CsvRow, columns: Partial<Record<CatalogField, string>>): PhoneRecord {
        const cell = (field: CatalogField): string | undefined => {
            const column = columns[field];
            return column ? row[column] : undefined;
        };

        const model = SpecParser.cleanText(cell("model"));
        return {
            brand: SpecParser.deriveBrand(model),
            model: model ?? "",
            price: SpecParser.parsePrice(cell("price")),
            ram: SpecParser.extractFirstInteger(cell("ram")),
            battery: SpecParser.extractFirstInteger(cell("battery")),
            camera: SpecParser.cleanText(cell("camera"))
        };
    }

    private static async fetchCatalog(): Promise<Catalog> {
        const localPath = AppConfig.catalogPath;
        const source = localPath ?? AppConfig.catalogUrl;
        const text = localPath ? await this.readLocalCsv(localPath) : await this.downloadCsv(source);

        const phones = this.parseCsv(text, source);
        const catalog = this.buildCatalog(phones, source);
        console.log("📱 Phone catalog loaded:", {
            phones: phones.length,
            brands: catalog.brands.length,
            maxRam: catalog.maxima.maxRam,
            maxBattery: catalog.maxima.maxBattery
        });
        return catalog;
    }

    private static async readLocalCsv(filePath: string): Promise<string> {
        try {
            return await fs.promises.readFile(filePath, "utf-8");
        } catch (error) {
            throw new CatalogLoadError(`Unable to read catalog file ${filePath}: ${getErrorMessage(error)}`, filePath, error);
        }
    }

    private static async downloadCsv(url: string): Promise<string> {
        let response: Response;
        try {
            response = await fetch(url);
        } catch (error) {
            throw new CatalogLoadError(`Network error: unable to download catalog from ${url}`, url, error);
        }

        if (!response.ok) {
            throw new CatalogLoadError(`Catalog download failed with status ${response.status}`, url);
        }
        return response.text();
    }
}

export default CatalogService;
