import { describe, expect, it } from "vitest";
import { SpecParser } from "./SpecParser";

describe("SpecParser.parsePrice", () => {
    it("strips currency symbols and thousands separators", () => {
        expect(SpecParser.parsePrice("₹1,23,999")).toBe(123999);
        expect(SpecParser.parsePrice("₹ 30,999")).toBe(30999);
        expect(SpecParser.parsePrice("$ 499.50")).toBe(499.5);
    });

    it("passes finite numbers through", () => {
        expect(SpecParser.parsePrice(15000)).toBe(15000);
    });

    it("returns null for unparseable or negative values", () => {
        expect(SpecParser.parsePrice("Price on request")).toBeNull();
        expect(SpecParser.parsePrice("")).toBeNull();
        expect(SpecParser.parsePrice("-5")).toBeNull();
        expect(SpecParser.parsePrice(undefined)).toBeNull();
        expect(SpecParser.parsePrice(Number.NaN)).toBeNull();
    });

    it("rejects numeric notations other than plain decimals", () => {
        expect(SpecParser.parsePrice("0x1F")).toBeNull();
        expect(SpecParser.parsePrice("1e5")).toBeNull();
        expect(SpecParser.parsePrice("Infinity")).toBeNull();
        expect(SpecParser.parsePrice("12.")).toBeNull();
    });
});

describe("SpecParser.extractFirstInteger", () => {
    it("takes the first integer embedded in the text", () => {
        expect(SpecParser.extractFirstInteger("8 GB RAM, 128 GB inbuilt")).toBe(8);
        expect(SpecParser.extractFirstInteger("5000 mAh Battery with 25W Fast Charging")).toBe(5000);
    });

    it("returns null when there is no digit", () => {
        expect(SpecParser.extractFirstInteger("not listed")).toBeNull();
        expect(SpecParser.extractFirstInteger("")).toBeNull();
        expect(SpecParser.extractFirstInteger(null)).toBeNull();
    });
});

describe("SpecParser.deriveBrand", () => {
    it("uses the first token of the model name", () => {
        expect(SpecParser.deriveBrand("Samsung Galaxy A35 5G")).toBe("Samsung");
        expect(SpecParser.deriveBrand("  OnePlus   12")).toBe("OnePlus");
    });

    it("returns null for blank or non-text model names", () => {
        expect(SpecParser.deriveBrand("   ")).toBeNull();
        expect(SpecParser.deriveBrand(42)).toBeNull();
        expect(SpecParser.deriveBrand(null)).toBeNull();
    });
});

describe("SpecParser camera parsing", () => {
    it("reads each lens rating", () => {
        expect(SpecParser.parseCameraMegapixels("50MP+8MP+2MP")).toEqual([50, 8, 2]);
        expect(SpecParser.parseCameraMegapixels("50 MP + 12.5MP")).toEqual([50, 12.5]);
    });

    it("skips segments without a leading number", () => {
        expect(SpecParser.parseCameraMegapixels("48MP+ultra wide")).toEqual([48]);
        expect(SpecParser.parseCameraMegapixels("Dual Camera")).toEqual([]);
        expect(SpecParser.parseCameraMegapixels(50)).toEqual([]);
    });

    it("averages the parsed lenses", () => {
        expect(SpecParser.averageCameraMegapixels("50MP+8MP+2MP")).toBe(20);
        expect(SpecParser.averageCameraMegapixels("wide")).toBeNull();
    });
});
