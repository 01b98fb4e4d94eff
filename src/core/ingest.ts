/**
 * Result manifest ingestion: a JSON array of result entries, streamed so
 * large manifests never have to be parsed in one piece.
 */
import { createReadStream } from "node:fs";
import StreamJson from "stream-json";
import StreamArray from "stream-json/streamers/StreamArray.js";
import { z } from "zod";

import type { MetadataStore } from "../store/metadata.js";
import { buildResultUrl } from "../server/urls.js";
import { ConsistencyError, InvalidRecordError } from "./exceptions.js";
import { logInfo, logWarning } from "./logger.js";
import type { IngestReport } from "./types.js";

const CHUNK_SIZE = 500;

export const ManifestEntrySchema = z.object({
  query_pack: z.string().trim().min(1),
  archive_id: z.string().min(1),
  produced_at: z.string().datetime({ offset: true }),
  result_url: z.string().min(1).optional().nullable(),
});

export type ManifestEntry = z.infer<typeof ManifestEntrySchema>;

/** Stream a manifest file, yielding raw array elements in batches. */
export async function* readManifest(path: string): AsyncGenerator<unknown[]> {
  const source = createReadStream(path);
  const jsonParser = StreamJson.parser();
  const arrayStream = StreamArray.make();
  // pipe() does not forward errors; surface them through the iterated stream.
  source.on("error", (err) => arrayStream.destroy(err));
  jsonParser.on("error", (err) => arrayStream.destroy(err));
  source.pipe(jsonParser).pipe(arrayStream);

  let chunk: unknown[] = [];
  try {
    for await (const item of arrayStream) {
      const { value }: { value: unknown } = item;
      chunk.push(value);
      if (chunk.length >= CHUNK_SIZE) {
        yield chunk;
        chunk = [];
      }
    }
  } finally {
    source.destroy();
  }
  if (chunk.length > 0) yield chunk;
}

export class ResultIngestor {
  private store: MetadataStore;
  private baseUrl: string;

  constructor(store: MetadataStore, baseUrl: string) {
    this.store = store;
    this.baseUrl = baseUrl;
  }

  async ingest(path: string): Promise<IngestReport> {
    const report: IngestReport = { accepted: 0, rejected: 0, errors: [] };
    let index = 0;

    for await (const batch of readManifest(path)) {
      for (const raw of batch) {
        const position = index++;
        const parsed = ManifestEntrySchema.safeParse(raw);
        if (!parsed.success) {
          report.rejected++;
          report.errors.push(
            `entry ${position}: ${parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`,
          );
          continue;
        }
        try {
          await this.put(parsed.data);
          report.accepted++;
        } catch (err) {
          if (!(err instanceof ConsistencyError || err instanceof InvalidRecordError)) throw err;
          report.rejected++;
          report.errors.push(`entry ${position}: ${err.message}`);
        }
      }
    }

    if (report.rejected > 0) {
      logWarning("Some manifest entries were rejected", {
        path,
        rejected: report.rejected,
      });
    }
    logInfo("Ingested result manifest", { path, accepted: report.accepted });
    return report;
  }

  private async put(entry: ManifestEntry): Promise<void> {
    let resultUrl = entry.result_url;
    if (!resultUrl) {
      const archive = await this.store.getArchive(entry.archive_id);
      if (!archive) throw new ConsistencyError(entry.archive_id);
      resultUrl = buildResultUrl(this.baseUrl, archive.filePath);
    }
    await this.store.putResult({
      queryPack: entry.query_pack,
      archiveId: entry.archive_id,
      resultUrl,
      producedAt: entry.produced_at,
    });
  }
}
