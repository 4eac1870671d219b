import type { PostRecord } from "../domain/models";

/** Keeps the first occurrence of each post id. */
export function dedupeRecords<T extends PostRecord>(records: readonly T[]): T[] {
  const seen = new Set<string>();
  const unique: T[] = [];
  for (const record of records) {
    if (seen.has(record.postId)) continue;
    seen.add(record.postId);
    unique.push(record);
  }
  return unique;
}

/**
 * Orders by like count descending and assigns 1-based ranks. Records whose
 * count could not be read sort after every confident one. Ties keep the
 * order in which they were first seen, so re-ranking a ranked set is a no-op.
 */
export function rank<T extends PostRecord>(records: readonly T[], targetCount: number): Array<T & { rank: number }> {
  const ordered = dedupeRecords(records)
    .map((record, index) => ({ record, index }))
    .sort((a, b) => {
      const confidence =
        Number(a.record.likeConfidence === "low") - Number(b.record.likeConfidence === "low");
      if (confidence !== 0) return confidence;
      if (b.record.likeCount !== a.record.likeCount) return b.record.likeCount - a.record.likeCount;
      return a.index - b.index;
    });

  return ordered.slice(0, Math.max(0, targetCount)).map(({ record }, index) => ({ ...record, rank: index + 1 }));
}
