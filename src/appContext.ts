import { createTutorReplyGeneratorFromEnv, type TutorReplyGenerator } from "./ai/tutorReplyGenerator";
import { AssignmentStore } from "./assignments/assignmentStore";
import { AuthService } from "./auth/authService";
import { DashboardCache } from "./dashboard/dashboardCache";
import type { FocusDashboardResponse } from "./dashboard/dashboardTypes";
import { SystemMonitor } from "./dashboard/systemMonitor";
import { TelemetryStore } from "./dashboard/telemetryStore";
import { ChatSessionStore } from "./session/chatSessionStore";
import { defaultRandom, type RandomSource } from "./utils/random";

/** Everything the HTTP layer holds state in or calls out to. */
export interface AppContext {
  auth: AuthService;
  sessions: ChatSessionStore;
  assignments: AssignmentStore;
  telemetry: TelemetryStore;
  tutor: TutorReplyGenerator;
  random: RandomSource;
  dashboardCache: DashboardCache<FocusDashboardResponse>;
  monitor: SystemMonitor;
}

export const DASHBOARD_CACHE_PREFIX = "dashboard:";

export const createAppContext = (overrides: Partial<AppContext> = {}): AppContext => {
  const ctx: AppContext = {
    auth: overrides.auth ?? new AuthService(),
    sessions: overrides.sessions ?? new ChatSessionStore(),
    assignments: overrides.assignments ?? new AssignmentStore(),
    telemetry: overrides.telemetry ?? new TelemetryStore(),
    tutor: overrides.tutor ?? createTutorReplyGeneratorFromEnv(),
    random: overrides.random ?? defaultRandom,
    dashboardCache: overrides.dashboardCache ?? new DashboardCache<FocusDashboardResponse>(),
    monitor: overrides.monitor ?? new SystemMonitor()
  };

  ctx.telemetry.onRecord(() => ctx.dashboardCache.invalidateCache(DASHBOARD_CACHE_PREFIX));
  return ctx;
};
