import { z } from "zod";
import { RawJournalEntry } from "../domain/journalEntry";
import { JournalDetails } from "../domain/journalDetails";

/**
 * Tahvel API client
 *
 * Thin wrapper over the hois_back REST endpoints used for checking journals.
 * Every request carries the user's session cookie. Paginated endpoints are
 * read page by page, one request at a time.
 */

export interface FetchResponse {
  ok: boolean;
  status: number;
  statusText: string;
  json(): Promise<unknown>;
}

export type FetchFn = (
  url: string,
  init: { method: "GET"; headers: Record<string, string> }
) => Promise<FetchResponse>;

export interface TahvelClientOptions {
  baseUrl: string;
  cookie: string;
  pageSize: number;
  lang: string;
  fetch?: FetchFn;
}

export interface StudyYear {
  id: string;
  name: string;
}

export interface JournalSummary {
  id: string;
  name: string;
}

type QueryParams = Record<string, string | number>;

export class TahvelHttpError extends Error {
  readonly status: number;
  readonly url: string;

  constructor(status: number, statusText: string, url: string) {
    super(`HTTP ${status}${statusText ? ` ${statusText}` : ""} for ${url}`);
    this.name = "TahvelHttpError";
    this.status = status;
    this.url = url;
  }

  /**
   * 401 and 403 usually mean the session cookie has expired
   */
  get isAuthError(): boolean {
    return this.status === 401 || this.status === 403;
  }
}

export class TahvelResponseError extends Error {
  readonly url: string;

  constructor(url: string, details: string) {
    super(`Unexpected response from ${url}: ${details}`);
    this.name = "TahvelResponseError";
    this.url = url;
  }
}

// ============================================
// Response shapes
// ============================================

const idSchema = z.union([z.number(), z.string()]).transform(String);

const lessonInfoSchema = z.object({
  lessonPlanDates: z.array(z.string()).nullish(),
});

const pageSchema = z.object({
  content: z.array(z.unknown()).nullish(),
  last: z.boolean().nullish(),
});

const journalEntrySchema = z.record(z.unknown());

const journalDetailsSchema = z.object({
  lessonHours: z
    .object({
      totalPlannedHours: z.number().nullish(),
      capacityHours: z
        .array(
          z.object({
            capacity: z.string(),
            plannedHours: z.number().nullish(),
            usedHours: z.number().nullish(),
          })
        )
        .nullish(),
    })
    .nullish(),
});

const classifierListSchema = z.array(z.object({ code: z.string() }));

const namedItemSchema = z.object({
  id: idSchema,
  nameEt: z.string().nullish(),
});

const studyYearListSchema = z.array(namedItemSchema);

const journalListItemSchema = z.union([namedItemSchema, idSchema]);

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

export class TahvelClient {
  private readonly baseUrl: string;
  private readonly cookie: string;
  private readonly pageSize: number;
  private readonly lang: string;
  private readonly fetchFn: FetchFn;

  constructor(options: TahvelClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.cookie = options.cookie;
    this.pageSize = options.pageSize;
    this.lang = options.lang;
    this.fetchFn = options.fetch ?? fetch;
  }

  /**
   * Planned lesson instants (ISO-8601) of a journal
   */
  async getPlannedDates(journalId: string): Promise<string[]> {
    const data = await this.getJson(
      `/journals/${encodeURIComponent(journalId)}/journalEntry/lessonInfo`,
      lessonInfoSchema
    );
    return data.lessonPlanDates ?? [];
  }

  /**
   * All journal entries of a journal, across every page
   */
  async getJournalEntries(journalId: string): Promise<RawJournalEntry[]> {
    return this.getAllPages(
      `/journals/${encodeURIComponent(journalId)}/journalEntry`,
      journalEntrySchema,
      { lang: this.lang }
    );
  }

  /**
   * Planned and used hours of a journal, per capacity
   */
  async getJournalDetails(journalId: string): Promise<JournalDetails> {
    const data = await this.getJson(`/journals/${encodeURIComponent(journalId)}`, journalDetailsSchema);
    const lessonHours = data.lessonHours;

    return {
      totalPlannedHours: lessonHours?.totalPlannedHours ?? 0,
      capacityHours: (lessonHours?.capacityHours ?? []).map(hours => ({
        capacity: hours.capacity,
        plannedHours: hours.plannedHours ?? 0,
        usedHours: hours.usedHours ?? 0,
      })),
    };
  }

  /**
   * Codes of the journal entry types (SISSEKANNE classifier)
   */
  async getEntryTypes(): Promise<string[]> {
    const data = await this.getJson("/autocomplete/classifiers", classifierListSchema, {
      mainClassCode: "SISSEKANNE",
    });
    return data.map(classifier => classifier.code);
  }

  async getStudyYears(): Promise<StudyYear[]> {
    const data = await this.getJson("/autocomplete/studyYears", studyYearListSchema);
    return data.map(year => ({ id: year.id, name: year.nameEt ?? "Unknown" }));
  }

  /**
   * The current user's journals in a study year.
   * The list may hold bare journal ids instead of objects; items of any other shape are skipped.
   */
  async getJournals(studyYearId: string): Promise<JournalSummary[]> {
    const items = await this.getAllPages("/journals", z.unknown(), {
      lang: this.lang,
      onlyMyJournals: "true",
      sort: "2,+5,+3,asc",
      studyYear: studyYearId,
    });

    const journals: JournalSummary[] = [];
    items.forEach((item, index) => {
      const parsed = journalListItemSchema.safeParse(item);
      if (!parsed.success) {
        console.warn(`⚠️  Skipping journal ${index + 1} - invalid format: ${JSON.stringify(item)}`);
        return;
      }
      const value = parsed.data;
      journals.push(
        typeof value === "string"
          ? { id: value, name: `Journal ${value}` }
          : { id: value.id, name: value.nameEt ?? "Unknown" }
      );
    });
    return journals;
  }

  // ============================================
  // Request helpers
  // ============================================

  private buildUrl(pathname: string, params: QueryParams = {}): string {
    const url = new URL(`${this.baseUrl}${pathname}`);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  private async getJson<T>(
    pathname: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    params?: QueryParams
  ): Promise<T> {
    const url = this.buildUrl(pathname, params);
    const response = await this.fetchFn(url, {
      method: "GET",
      headers: {
        Accept: "application/json",
        Cookie: this.cookie,
      },
    });

    if (!response.ok) {
      throw new TahvelHttpError(response.status, response.statusText, url);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new TahvelResponseError(url, error instanceof Error ? error.message : String(error));
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new TahvelResponseError(url, describeIssues(parsed.error));
    }
    return parsed.data;
  }

  /**
   * Follow page numbers from 0 until the API reports the last page
   */
  private async getAllPages<T>(
    pathname: string,
    itemSchema: z.ZodType<T, z.ZodTypeDef, unknown>,
    params: QueryParams
  ): Promise<T[]> {
    const items: T[] = [];
    const itemsSchema = z.array(itemSchema);
    let page = 0;

    for (;;) {
      const data = await this.getJson(pathname, pageSchema, { ...params, page, size: this.pageSize });
      const content = itemsSchema.safeParse(data.content ?? []);
      if (!content.success) {
        throw new TahvelResponseError(this.buildUrl(pathname, params), describeIssues(content.error));
      }
      items.push(...content.data);

      if (data.last ?? true) {
        break;
      }
      page++;
    }

    return items;
  }
}
