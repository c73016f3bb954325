/**
 * Recommendation Configuration
 * Centralized constants for scoring, budget bounds and catalog column mapping
 */

import type { Priority } from "../models/preference.model";

export const PRIORITIES: readonly Priority[] = ["Performance", "Camera", "Battery", "Display", "Balanced"];

export const DEFAULT_PRIORITY: Priority = "Balanced";

export const BUDGET_SLIDER = {
    min: 5000,
    max: 100000,
    defaultRange: [10000, 30000] as const
};

export const TOP_RECOMMENDATIONS = 3;

export const CURRENCY_SYMBOL = "₹";

export const SCORING_WEIGHTS = {
    budgetMatch: 1.0,
    budgetPenalty: -0.5,
    performance: 2.0,
    battery: 1.0,
    cameraDivisor: 100
};

// Display has no scoring term of its own, so it carries no boost either
export const PRIORITY_MULTIPLIERS: Record<Priority, number> = {
    Performance: 1.2,
    Camera: 1.1,
    Battery: 1.15,
    Display: 1.0,
    Balanced: 1.0
};

export const CATALOG_FIELDS = ["model", "price", "ram", "battery", "camera"] as const;

export type CatalogField = typeof CATALOG_FIELDS[number];

// Canonical field -> accepted (lowercased) CSV headers
export const CATALOG_COLUMN_ALIASES: Record<CatalogField, readonly string[]> = {
    model: ["model", "model name"],
    price: ["price"],
    ram: ["ram", "memory"],
    battery: ["battery", "battery capacity"],
    camera: ["camera", "rear camera", "rear_camera"]
};
