import { describe, it, expect } from "vitest";
import { countPersonalPronouns } from "../pronouns";

describe("countPersonalPronouns", () => {
    it("counts I, we and us but never the country US", () => {
        expect(countPersonalPronouns("I think we should help US and us")).toBe(3);
    });

    it("matches we, my, ours and us in any case", () => {
        expect(countPersonalPronouns("My friends and ours")).toBe(2);
        expect(countPersonalPronouns("We, WE, we.")).toBe(3);
        expect(countPersonalPronouns("Us")).toBe(1);
    });

    it("only counts an uppercase I", () => {
        expect(countPersonalPronouns("i was there")).toBe(0);
    });

    it("matches whole words only", () => {
        expect(countPersonalPronouns("Trust the USA museum")).toBe(0);
        expect(countPersonalPronouns("Myth, wealth and yours")).toBe(0);
        expect(countPersonalPronouns("usé")).toBe(0);
    });

    it("counts pronouns inside contractions", () => {
        expect(countPersonalPronouns("I'm sure")).toBe(1);
        expect(countPersonalPronouns("I'm sure we're done and we've won; I'll tell my team, let us go.")).toBe(6);
        expect(countPersonalPronouns("We’ll see")).toBe(1);
    });

    it("returns 0 for empty text", () => {
        expect(countPersonalPronouns("")).toBe(0);
    });
});
