import { mkdir, writeFile } from "fs/promises";
import { dirname } from "path";
import type { RankedPost } from "../domain/models";
import type { Destination, ExportReceipt, ExportSink } from "./sink";
import { logger } from "../core/logger";

export class FileSink implements ExportSink {
  readonly kind = "file";

  async write(results: readonly RankedPost[], destination: Destination): Promise<ExportReceipt> {
    if (destination.kind !== "file") {
      throw new Error(`FileSink cannot write to a ${destination.kind} destination`);
    }

    await mkdir(dirname(destination.path), { recursive: true });
    await writeFile(destination.path, `${JSON.stringify(results, null, 2)}\n`, "utf-8");

    logger.info({ path: destination.path, rows: results.length }, "Exported results to file");
    return { kind: "file", location: destination.path, rows: results.length };
  }
}
