import { describe, expect, it } from "vitest";
import ValidationService from "./helper.service";
import { PreferenceValidationError } from "../models/errors.model";

describe("ValidationService.parsePreferenceContext", () => {
    it("falls back to the default budget range and Balanced priority", () => {
        expect(ValidationService.parsePreferenceContext({})).toEqual({
            isValid: true,
            context: { budgetMin: 10000, budgetMax: 30000, priority: "Balanced", brandFilter: [] }
        });
    });

    it("accepts numeric strings and comma separated brands", () => {
        const result = ValidationService.parsePreferenceContext({
            budgetMin: "15000",
            budgetMax: 45000,
            priority: "Camera",
            brands: "Samsung, Apple, Samsung"
        });

        expect(result).toEqual({
            isValid: true,
            context: { budgetMin: 15000, budgetMax: 45000, priority: "Camera", brandFilter: ["Samsung", "Apple"] }
        });
    });

    it("keeps the free-text requirement without interpreting it", () => {
        const result = ValidationService.parsePreferenceContext({
            requirement: "  I need a gaming phone under 20000  ",
            brands: ["Poco"]
        });

        expect(result).toEqual({
            isValid: true,
            context: {
                budgetMin: 10000,
                budgetMax: 30000,
                priority: "Balanced",
                brandFilter: ["Poco"],
                requirement: "I need a gaming phone under 20000"
            }
        });
    });

    it("rejects an inverted budget", () => {
        expect(ValidationService.parsePreferenceContext({ budgetMin: 40000, budgetMax: 20000 })).toEqual({
            isValid: false,
            errors: ["budgetMin cannot be greater than budgetMax"]
        });
    });

    it("collects every invalid field", () => {
        const result = ValidationService.parsePreferenceContext({
            budgetMin: "cheap",
            priority: "Gaming",
            brands: [1, 2],
            requirement: 5
        });

        expect(result).toEqual({
            isValid: false,
            errors: [
                "budgetMin must be a non-negative number",
                "priority must be one of: Performance, Camera, Battery, Display, Balanced",
                "brands must be a list of brand names",
                "requirement must be text"
            ]
        });
    });

    it("throws a validation error from assertPreferenceContext", () => {
        expect(() => ValidationService.assertPreferenceContext({ budgetMax: -1 })).toThrow(PreferenceValidationError);
    });
});

describe("ValidationService.validateBody", () => {
    it("requires non-empty fields", () => {
        expect(ValidationService.validateBody({ message: "hello" }, ["message"])).toBe(true);
        expect(ValidationService.validateBody({ message: "   " }, ["message"])).toBe(false);
        expect(ValidationService.validateBody({}, ["message"])).toBe(false);
        expect(ValidationService.validateBody(null, ["message"])).toBe(false);
    });
});
