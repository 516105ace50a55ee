import { describe, it, expect } from "vitest";
import { capacityCovers, caseMentionsFormFactor, valuesMatch } from "../compatibilityRules";

describe("compatibilityRules", () => {
  describe("caseMentionsFormFactor", () => {
    it("matches a listed form factor among several", () => {
      expect(caseMentionsFormFactor("H5 FLOW ATX / MATX / MINI-ITX", "ITX")).toBe(true);
      expect(caseMentionsFormFactor("ATX/MATX", "MATX")).toBe(true);
    });

    it("does not read ATX inside E-ATX or MATX", () => {
      expect(caseMentionsFormFactor("FULL TOWER E-ATX", "ATX")).toBe(false);
      expect(caseMentionsFormFactor("CUBE MATX", "ATX")).toBe(false);
      expect(caseMentionsFormFactor("SFF MINI-ITX", "ATX")).toBe(false);
    });

    it("folds alternate spellings", () => {
      expect(caseMentionsFormFactor("EATX READY", "E-ATX")).toBe(true);
      expect(caseMentionsFormFactor("M-ATX CUBE", "MATX")).toBe(true);
      expect(caseMentionsFormFactor("mini-itx", "ITX")).toBe(true);
    });
  });

  describe("valuesMatch", () => {
    it("passes when either side is unknown", () => {
      expect(valuesMatch(undefined, "AM5")).toBe(true);
      expect(valuesMatch("AM5", undefined)).toBe(true);
    });

    it("compares known values exactly", () => {
      expect(valuesMatch("AM5", "AM5")).toBe(true);
      expect(valuesMatch("AM5", "LGA1700")).toBe(false);
    });
  });

  describe("capacityCovers", () => {
    it("passes without a demand", () => {
      expect(capacityCovers(undefined, undefined)).toBe(true);
    });

    it("fails an unknown capacity once a demand exists", () => {
      expect(capacityCovers(undefined, 300)).toBe(false);
    });

    it("accepts a capacity equal to the demand", () => {
      expect(capacityCovers(850, 850)).toBe(true);
      expect(capacityCovers(750, 850)).toBe(false);
    });
  });
});
