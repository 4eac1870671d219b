import * as cheerio from "cheerio";
import { PostRecordSchema, type PostRecord } from "../../domain/models";
import { logger } from "../../core/logger";
import type { ExtractionContext } from "../adapter";
import { DEFAULT_STRATEGIES, type ExtractionStrategy } from "./parsers";

function isPlausible(record: PostRecord): boolean {
  return PostRecordSchema.safeParse(record).success;
}

export class RecordExtractor {
  constructor(
    private baseUrl: string,
    private strategies: readonly ExtractionStrategy[] = DEFAULT_STRATEGIES
  ) {}

  /**
   * Returns the records found by the first strategy that produces at least
   * one plausible record. An unrecognised page yields an empty list.
   */
  extract(html: string, context: ExtractionContext): PostRecord[] {
    if (!html.trim()) return [];

    const $ = cheerio.load(html);

    for (const strategy of this.strategies) {
      let records: PostRecord[];
      try {
        records = strategy.extract($, { ...context, baseUrl: this.baseUrl });
      } catch (error) {
        logger.debug({ err: error, strategy: strategy.name }, "Extraction strategy failed, trying next");
        continue;
      }

      const plausible = records.filter(isPlausible);
      if (plausible.length > 0) {
        const lowConfidence = plausible.filter((record) => record.likeConfidence === "low").length;
        logger.debug(
          { keyword: context.keyword, strategy: strategy.name, extracted: plausible.length, lowConfidence },
          "Extraction pass complete"
        );
        return plausible;
      }
    }

    logger.debug({ keyword: context.keyword }, "No extraction strategy matched the page");
    return [];
  }
}
