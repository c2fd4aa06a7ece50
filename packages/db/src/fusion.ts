/**
 * Fusion Datasheet Store
 * Table store over the datasheet REST API:
 *   GET/POST {baseUrl}/datasheets/{tableId}/records?fieldKey=name
 */

import { z } from "zod";
import { UpstreamTransportError, logger, type ChildLogger } from "@channel-pulse/core";
import type { RecordFields, TableRecord, TableStore } from "./table-store.js";

export const DEFAULT_TABLE_TIMEOUT_MS = 30_000;
export const DEFAULT_PAGE_SIZE = 1000;

/** The datasheet API rejects create calls with more records */
export const CREATE_BATCH_SIZE = 10;

const SERVICE = "fusion";

export interface FusionTableStoreOptions {
  baseUrl: string;
  token: string;
  tableId: string;
  timeoutMs?: number;
  pageSize?: number;
}

const RecordSchema = z
  .object({
    recordId: z.string().optional(),
    fields: z.record(z.unknown()).default({}),
  })
  .passthrough();

const PageSchema = z
  .object({
    records: z.array(RecordSchema).default([]),
    total: z.number().optional(),
  })
  .passthrough();

// Records arrive either at the top level or wrapped in `data`
const ResponseSchema = z
  .object({
    success: z.boolean().optional(),
    message: z.string().optional(),
    data: PageSchema.nullish(),
    records: z.array(RecordSchema).optional(),
    total: z.number().optional(),
  })
  .passthrough();

type FusionResponse = z.infer<typeof ResponseSchema>;
type FusionPage = z.infer<typeof PageSchema>;

function pageOf(response: FusionResponse): FusionPage {
  return response.data ?? { records: response.records ?? [], total: response.total };
}

export class FusionTableStore implements TableStore {
  readonly kind = "fusion";

  private readonly recordsUrl: string;
  private readonly token: string;
  private readonly timeoutMs: number;
  private readonly pageSize: number;
  private readonly log: ChildLogger;

  constructor(options: FusionTableStoreOptions) {
    const base = options.baseUrl.replace(/\/+$/, "");
    this.recordsUrl = `${base}/datasheets/${encodeURIComponent(options.tableId)}/records`;
    this.token = options.token;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TABLE_TIMEOUT_MS;
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    this.log = logger.child({ component: SERVICE, tableId: options.tableId });
  }

  async listRecords(): Promise<TableRecord[]> {
    const records: TableRecord[] = [];

    for (let pageNum = 1; ; pageNum++) {
      const page = pageOf(
        await this.request("GET", { pageNum: String(pageNum), pageSize: String(this.pageSize) })
      );

      for (const record of page.records) {
        records.push({ id: record.recordId, fields: record.fields });
      }

      const exhausted =
        page.records.length === 0 ||
        (page.total !== undefined ? records.length >= page.total : page.records.length < this.pageSize);
      if (exhausted) break;
    }

    this.log.debug("Listed records", { count: records.length });
    return records;
  }

  async createRecords(records: readonly RecordFields[]): Promise<number> {
    let written = 0;

    for (let i = 0; i < records.length; i += CREATE_BATCH_SIZE) {
      const batch = records.slice(i, i + CREATE_BATCH_SIZE);
      await this.request("POST", {}, { records: batch.map((fields) => ({ fields })) });
      written += batch.length;
    }

    this.log.debug("Created records", { count: written });
    return written;
  }

  private async request(
    method: "GET" | "POST",
    params: Record<string, string>,
    body?: object
  ): Promise<FusionResponse> {
    const query = new URLSearchParams({ fieldKey: "name", ...params });
    const url = `${this.recordsUrl}?${query.toString()}`;
    const endpoint = `${method} /records`;

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    let response: Response;
    let text: string;
    try {
      response = await fetch(url, {
        method,
        headers: {
          Authorization: `Bearer ${this.token}`,
          "Content-Type": "application/json",
        },
        body: body ? JSON.stringify(body) : undefined,
        signal: controller.signal,
      });
      text = await response.text();
    } catch (error) {
      throw new UpstreamTransportError(
        controller.signal.aborted
          ? `Datasheet request timed out after ${this.timeoutMs}ms`
          : `Failed to reach datasheet API: ${error instanceof Error ? error.message : String(error)}`,
        SERVICE,
        { endpoint, cause: error instanceof Error ? error : undefined }
      );
    } finally {
      clearTimeout(timer);
    }

    if (!response.ok) {
      throw new UpstreamTransportError(
        `Datasheet API error ${response.status}: ${text.slice(0, 200)}`,
        SERVICE,
        { statusCode: response.status, endpoint }
      );
    }

    let json: unknown;
    try {
      json = text ? JSON.parse(text) : {};
    } catch (error) {
      throw new UpstreamTransportError("Datasheet API returned invalid JSON", SERVICE, {
        statusCode: response.status,
        endpoint,
        cause: error instanceof Error ? error : undefined,
      });
    }

    const parsed = ResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new UpstreamTransportError(
        `Malformed datasheet response: ${parsed.error.issues[0]?.message ?? "invalid payload"}`,
        SERVICE,
        { statusCode: response.status, endpoint }
      );
    }

    if (parsed.data.success === false) {
      throw new UpstreamTransportError(
        `Datasheet API rejected the request: ${parsed.data.message ?? "no message"}`,
        SERVICE,
        { statusCode: response.status, endpoint }
      );
    }

    return parsed.data;
  }
}
