import crypto from "crypto";
import fs from "fs/promises";
import path from "path";
import { z } from "zod";

import { messageQualitySchema } from "../evaluation/messageQuality";
import { DRIFT_TYPES, INTERVENTION_URGENCIES, RECOMMENDATIONS } from "../focus";
import { logger } from "../utils/logger";
import type { DashboardPeriod } from "./dashboardTypes";

const driftFields = {
  drift_score: z.number(),
  drift_type: z.enum(DRIFT_TYPES),
  recommendation: z.enum(RECOMMENDATIONS),
  confidence: z.number(),
  urgency: z.enum(INTERVENTION_URGENCIES)
};

const telemetryEventSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("chat_turn"),
    timestamp: z.string(),
    actor_hash: z.string().optional(),
    session_id: z.string(),
    source: z.enum(["answer_seeking", "focus_redirect", "tutor"]),
    ...driftFields,
    quality: messageQualitySchema.optional()
  }),
  z.object({
    kind: z.literal("focus_intervention"),
    timestamp: z.string(),
    actor_hash: z.string().optional(),
    session_id: z.string(),
    question_id: z.string().optional(),
    ...driftFields
  }),
  z.object({
    kind: z.literal("answer_seeking"),
    timestamp: z.string(),
    actor_hash: z.string().optional(),
    session_id: z.string()
  }),
  z.object({
    kind: z.literal("session_started"),
    timestamp: z.string(),
    actor_hash: z.string().optional(),
    session_id: z.string(),
    assignment_id: z.string().optional()
  }),
  z.object({
    kind: z.literal("system_error"),
    timestamp: z.string(),
    endpoint: z.string().optional(),
    status: z.number().optional(),
    message: z.string()
  })
]);

export type TelemetryEvent = z.infer<typeof telemetryEventSchema>;
export type TelemetryKind = TelemetryEvent["kind"];
export type ChatTurnEvent = Extract<TelemetryEvent, { kind: "chat_turn" }>;
export type FocusInterventionEvent = Extract<TelemetryEvent, { kind: "focus_intervention" }>;

export const periodToRange = (period: DashboardPeriod, now = new Date()): { from: Date; to: Date } => {
  const to = new Date(now);
  const from = new Date(now);

  if (period === "day") {
    from.setDate(from.getDate() - 1);
  } else if (period === "week") {
    from.setDate(from.getDate() - 7);
  } else {
    from.setMonth(from.getMonth() - 1);
  }

  return { from, to };
};

export interface TelemetryStoreOptions {
  retentionDays?: number;
  /** `null` keeps events in memory only. */
  telemetryFile?: string | null;
  salt?: string;
  now?: () => Date;
}

const errorCode = (err: unknown): string | undefined =>
  err instanceof Error && "code" in err && typeof err.code === "string" ? err.code : undefined;

export class TelemetryStore {
  private readonly retentionDays: number;
  private readonly telemetryFile: string | null;
  private readonly salt: string;
  private readonly now: () => Date;
  private readonly listeners: Array<(event: TelemetryEvent) => void> = [];
  private initialized: Promise<void> | null = null;
  private writeChain: Promise<void> = Promise.resolve();
  private events: TelemetryEvent[] = [];

  constructor(opts?: TelemetryStoreOptions) {
    this.retentionDays = opts?.retentionDays ?? 365;
    this.telemetryFile =
      opts?.telemetryFile === undefined
        ? process.env.TELEMETRY_FILE ?? path.join(process.cwd(), "data", "telemetry.jsonl")
        : opts.telemetryFile;
    this.salt = opts?.salt ?? process.env.ANONYMIZATION_SALT ?? "ecocritique-default-salt";
    this.now = opts?.now ?? (() => new Date());
  }

  private withinRetention(d: Date): boolean {
    const cutoff = this.now();
    cutoff.setDate(cutoff.getDate() - this.retentionDays);
    return d.getTime() >= cutoff.getTime();
  }

  private async ensureInitialized(): Promise<void> {
    if (this.initialized) return this.initialized;

    this.initialized = (async () => {
      const file = this.telemetryFile;
      if (!file) return;

      await fs.mkdir(path.dirname(file), { recursive: true });
      try {
        const raw = await fs.readFile(file, "utf8");
        const lines = raw.split("\n").filter(Boolean);
        const parsed: TelemetryEvent[] = [];

        for (const line of lines) {
          const evt = this.parseLine(line);
          if (evt) parsed.push(evt);
        }

        this.events = parsed;

        if (lines.length !== parsed.length) {
          await this.rewriteFile(file, parsed);
        }
      } catch (err: unknown) {
        if (errorCode(err) !== "ENOENT") {
          logger.warn({ err }, "telemetry_load_failed");
        }
        this.events = [];
      }
    })();

    return this.initialized;
  }

  private parseLine(line: string): TelemetryEvent | null {
    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch {
      return null;
    }
    const result = telemetryEventSchema.safeParse(json);
    if (!result.success) return null;

    const ts = new Date(result.data.timestamp);
    if (Number.isNaN(ts.getTime()) || !this.withinRetention(ts)) return null;
    return result.data;
  }

  private async rewriteFile(file: string, events: TelemetryEvent[]): Promise<void> {
    const tmp = `${file}.tmp`;
    const content = events.map((e) => JSON.stringify(e)).join("\n") + (events.length ? "\n" : "");
    await fs.writeFile(tmp, content, "utf8");
    await fs.rename(tmp, file);
  }

  anonymizeActorId(rawId: string): string {
    return crypto.createHash("sha256").update(`${this.salt}:${rawId}`).digest("hex");
  }

  onRecord(listener: (event: TelemetryEvent) => void): void {
    this.listeners.push(listener);
  }

  async isWritable(): Promise<boolean> {
    const file = this.telemetryFile;
    if (!file) return true;
    try {
      await this.ensureInitialized();
      await fs.mkdir(path.dirname(file), { recursive: true });
      await fs.appendFile(file, "", "utf8");
      return true;
    } catch {
      return false;
    }
  }

  async record(event: TelemetryEvent): Promise<void> {
    await this.ensureInitialized();

    const ts = new Date(event.timestamp);
    if (Number.isNaN(ts.getTime())) return;
    if (!this.withinRetention(ts)) return;

    this.events.push(event);
    for (const listener of this.listeners) listener(event);

    const file = this.telemetryFile;
    if (!file) return;

    this.writeChain = this.writeChain
      .then(async () => {
        await fs.appendFile(file, JSON.stringify(event) + "\n", "utf8");
      })
      .catch((err) => {
        logger.warn({ err }, "telemetry_append_failed");
      });

    await this.writeChain;
  }

  async query(range: { from: Date; to: Date }, opts?: { kind?: TelemetryKind[] }): Promise<TelemetryEvent[]> {
    await this.ensureInitialized();

    const fromMs = range.from.getTime();
    const toMs = range.to.getTime();

    return this.events.filter((evt) => {
      if (opts?.kind && !opts.kind.includes(evt.kind)) return false;
      const ms = new Date(evt.timestamp).getTime();
      return ms >= fromMs && ms <= toMs;
    });
  }
}
