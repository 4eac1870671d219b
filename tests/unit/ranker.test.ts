import { describe, it, expect } from "vitest";
import { dedupeRecords, rank } from "../../src/orchestration/ranker";
import { makeRecord } from "../helpers/records";

describe("Ranker", () => {
  describe("dedupeRecords", () => {
    it("should keep the first occurrence of each post", () => {
      const records = [makeRecord("a", 10), makeRecord("b", 5), makeRecord("a", 99)];
      const unique = dedupeRecords(records);
      expect(unique.map((r) => [r.postId, r.likeCount])).toEqual([
        ["a", 10],
        ["b", 5],
      ]);
    });
  });

  describe("rank", () => {
    it("should order by like count descending with 1-based ranks", () => {
      const ranked = rank([makeRecord("a", 10), makeRecord("b", 50), makeRecord("c", 30)], 10);
      expect(ranked.map((r) => [r.rank, r.postId])).toEqual([
        [1, "b"],
        [2, "c"],
        [3, "a"],
      ]);
    });

    it("should place low-confidence records after confident ones", () => {
      const ranked = rank(
        [makeRecord("unknown", 5000, { likeConfidence: "low" }), makeRecord("known", 3)],
        10
      );
      expect(ranked.map((r) => r.postId)).toEqual(["known", "unknown"]);
    });

    it("should keep first-seen order on ties", () => {
      const ranked = rank([makeRecord("a", 10), makeRecord("b", 10), makeRecord("c", 10)], 10);
      expect(ranked.map((r) => r.postId)).toEqual(["a", "b", "c"]);
    });

    it("should truncate to the target count", () => {
      const records = [1, 2, 3, 4, 5].map((n) => makeRecord(`p${n}`, n));
      const ranked = rank(records, 3);
      expect(ranked.map((r) => r.postId)).toEqual(["p5", "p4", "p3"]);
      expect(ranked.map((r) => r.rank)).toEqual([1, 2, 3]);
    });

    it("should return nothing for a zero target", () => {
      expect(rank([makeRecord("a", 1)], 0)).toEqual([]);
    });

    it("should be idempotent", () => {
      const records = [
        makeRecord("a", 10),
        makeRecord("b", 10),
        makeRecord("c", 7, { likeConfidence: "low" }),
        makeRecord("d", 99),
        makeRecord("a", 1),
      ];
      const once = rank(records, 3);
      expect(rank(once, 3)).toEqual(once);
    });
  });
});
