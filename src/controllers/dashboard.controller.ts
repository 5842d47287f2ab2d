import type { Request, Response } from "express";
import { z } from "zod";

import { DASHBOARD_CACHE_PREFIX, type AppContext } from "../appContext";
import { aggregateFocusMetrics, generateFocusInsights } from "../dashboard/dashboardAggregator";
import type { FocusDashboardResponse } from "../dashboard/dashboardTypes";
import { periodToRange } from "../dashboard/telemetryStore";
import { HttpError } from "../utils/httpError";
import { logger } from "../utils/logger";

const periodSchema = z.enum(["day", "week", "month"]);

const FOCUS_CACHE_TTL_MS = 30_000;
const HEALTH_WINDOW_MS = 60 * 60 * 1000;

export const createDashboardController = (ctx: AppContext) => ({
  async getFocusDashboard(req: Request, res: Response): Promise<void> {
    const parsedPeriod = periodSchema.safeParse(req.params.period);
    if (!parsedPeriod.success) {
      throw new HttpError(400, "Invalid period", parsedPeriod.error.flatten());
    }

    const period = parsedPeriod.data;
    const cacheKey = `${DASHBOARD_CACHE_PREFIX}focus:${period}`;

    try {
      const { value, cached } = await ctx.dashboardCache.getOrCompute(cacheKey, FOCUS_CACHE_TTL_MS, async () => {
        const range = periodToRange(period);
        const events = await ctx.telemetry.query(range);
        const metrics = aggregateFocusMetrics(events);

        const response: FocusDashboardResponse = {
          period,
          timestamp: new Date().toISOString(),
          range: { from: range.from.toISOString(), to: range.to.toISOString() },
          metrics,
          insights: generateFocusInsights(metrics)
        };
        return response;
      });

      res.status(200).json({ ok: true, data: value, cached });
    } catch (err) {
      logger.error({ err, period }, "focus_dashboard_failed");
      throw new HttpError(500, "Failed to build focus dashboard");
    }
  },

  async getSystemHealth(_req: Request, res: Response): Promise<void> {
    const snapshot = ctx.monitor.getSnapshot(HEALTH_WINDOW_MS);
    const telemetryWritable = await ctx.telemetry.isWritable();

    res.status(200).json({ ok: true, data: { ...snapshot, telemetryWritable } });
  }
});
