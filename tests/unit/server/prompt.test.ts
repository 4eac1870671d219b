import { describe, it, expect } from "vitest";
import { extractCount, extractKeyword } from "../../../src/server/prompt";

describe("Prompt parsing", () => {
  describe("extractKeyword", () => {
    it("should read the topic after 'about'", () => {
      expect(extractKeyword("top 20 posts about Clawbot")).toBe("Clawbot");
    });

    it("should read a quoted keyword", () => {
      expect(extractKeyword('find posts with keyword "claw bot" please')).toBe("claw bot");
    });

    it("should prefer an explicit keyword", () => {
      expect(extractKeyword("posts about bots with keyword moltbot")).toBe("moltbot");
    });

    it("should fall back to the last word without punctuation", () => {
      expect(extractKeyword("what is trending in AI?")).toBe("AI");
      expect(extractKeyword("Clawbot")).toBe("Clawbot");
    });

    it("should return an empty keyword for an empty prompt", () => {
      expect(extractKeyword("   ")).toBe("");
    });
  });

  describe("extractCount", () => {
    it("should read 'top N'", () => {
      expect(extractCount("top 20 posts about Clawbot", 10)).toBe(20);
    });

    it("should use the fallback when no count is given", () => {
      expect(extractCount("posts about Clawbot", 10)).toBe(10);
      expect(extractCount("top 0 posts", 10)).toBe(10);
    });
  });
});
