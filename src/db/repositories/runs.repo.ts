import { eq, desc, asc } from "drizzle-orm";
import type { CollectionRun, NewCollectionRun, KeywordCrawl, NewKeywordCrawl } from "../schema";
import { collectionRuns, keywordCrawls } from "../schema";
import type { AppDatabase } from "../client";
import { logger } from "../../core/logger";

const nowSeconds = () => Math.floor(Date.now() / 1000);

export class RunsRepository {
  constructor(private db: AppDatabase) {}

  async createRun(data: NewCollectionRun): Promise<CollectionRun> {
    const result = await this.db.insert(collectionRuns).values(data).returning();
    if (!result || result.length === 0 || !result[0]) {
      throw new Error("Failed to create collection run");
    }
    logger.info({ runId: result[0].id, trigger: result[0].trigger }, "Collection run created");
    return result[0];
  }

  async findById(id: number): Promise<CollectionRun | null> {
    const [result] = await this.db.select().from(collectionRuns).where(eq(collectionRuns.id, id)).limit(1);
    return result ?? null;
  }

  async listRecent(limit: number = 20): Promise<CollectionRun[]> {
    return this.db
      .select()
      .from(collectionRuns)
      .orderBy(desc(collectionRuns.startedAt), desc(collectionRuns.id))
      .limit(limit);
  }

  async updateRun(id: number, data: Partial<NewCollectionRun>): Promise<CollectionRun | null> {
    const [result] = await this.db.update(collectionRuns).set(data).where(eq(collectionRuns.id, id)).returning();
    return result ?? null;
  }

  async finishRun(id: number, status: CollectionRun["status"], notes?: string): Promise<void> {
    await this.updateRun(id, { status, endedAt: nowSeconds(), ...(notes !== undefined ? { notes } : {}) });
  }

  async createKeywordCrawl(data: NewKeywordCrawl): Promise<KeywordCrawl> {
    const result = await this.db.insert(keywordCrawls).values(data).returning();
    if (!result || result.length === 0 || !result[0]) {
      throw new Error("Failed to create keyword crawl");
    }
    logger.debug({ keywordCrawlId: result[0].id, keyword: data.keyword }, "Keyword crawl created");
    return result[0];
  }

  async findKeywordCrawlsByRunId(runId: number): Promise<KeywordCrawl[]> {
    return this.db
      .select()
      .from(keywordCrawls)
      .where(eq(keywordCrawls.runId, runId))
      .orderBy(asc(keywordCrawls.id));
  }

  async updateKeywordCrawl(id: number, data: Partial<NewKeywordCrawl>): Promise<KeywordCrawl | null> {
    const [result] = await this.db.update(keywordCrawls).set(data).where(eq(keywordCrawls.id, id)).returning();
    return result ?? null;
  }

  async finishKeywordCrawl(
    id: number,
    data: Omit<Partial<NewKeywordCrawl>, "id" | "runId" | "keyword" | "startedAt" | "endedAt">
  ): Promise<void> {
    await this.updateKeywordCrawl(id, { ...data, endedAt: nowSeconds() });
  }
}
