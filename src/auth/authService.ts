import crypto from "crypto";

import type { AuthSession, LoginInput, WeeklyCode } from "./authTypes";

export const MIN_STUDENT_ID_LENGTH = 6;
const GUEST_PREFIX = "guest_";
const GUEST_PREFIX_PATTERN = /^guest_/;
const WEEK_MS = 7 * 24 * 60 * 60 * 1000;

const sha256 = (value: string): string => crypto.createHash("sha256").update(value).digest("hex");

export interface AuthServiceOptions {
  professorUsername?: string;
  professorPassword?: string;
  weeklyCode?: string;
  now?: () => Date;
}

export class AuthService {
  private readonly professorCredentials = new Map<string, string>();
  private readonly roster = new Set<string>();
  private readonly tokens = new Map<string, AuthSession>();
  private readonly now: () => Date;
  private weeklyCode: WeeklyCode;

  constructor(opts?: AuthServiceOptions) {
    this.now = opts?.now ?? (() => new Date());

    const username = opts?.professorUsername ?? process.env.PROFESSOR_USERNAME ?? "admin";
    const password = opts?.professorPassword ?? process.env.PROFESSOR_PASSWORD ?? "landscape2024";
    this.professorCredentials.set(username, sha256(password));

    this.weeklyCode = this.codeFrom(opts?.weeklyCode ?? process.env.WEEKLY_ACCESS_CODE ?? "week1_2024");
  }

  private codeFrom(code: string): WeeklyCode {
    return { current: code, expires_at: new Date(this.now().getTime() + WEEK_MS).toISOString() };
  }

  private issue(role: AuthSession["role"], userId: string): AuthSession {
    const session: AuthSession = {
      token: crypto.randomUUID(),
      role,
      user_id: userId,
      issued_at: this.now().toISOString()
    };
    this.tokens.set(session.token, session);
    return { ...session };
  }

  /** Returns null when the credentials are rejected. */
  login(input: LoginInput): AuthSession | null {
    if (input.role === "guest") {
      // Guest ids are always `guest_`-prefixed and end in a random suffix; student ids never take the prefix.
      const suffix = crypto.randomUUID().slice(0, 8);
      const name = input.user_id?.trim().replace(GUEST_PREFIX_PATTERN, "");
      return this.issue("guest", name ? `${GUEST_PREFIX}${name}_${suffix}` : `${GUEST_PREFIX}${suffix}`);
    }

    if (input.role === "student") {
      const studentId = input.user_id.trim();
      if (studentId.length < MIN_STUDENT_ID_LENGTH || studentId.startsWith(GUEST_PREFIX)) return null;
      if (input.access_code !== this.weeklyCode.current) return null;

      this.roster.add(studentId);
      return this.issue("student", studentId);
    }

    const stored = this.professorCredentials.get(input.user_id);
    if (!stored || stored !== sha256(input.password)) return null;
    return this.issue("professor", input.user_id);
  }

  resolveToken(token: string): AuthSession | null {
    const session = this.tokens.get(token);
    return session ? { ...session } : null;
  }

  logout(token: string): boolean {
    return this.tokens.delete(token);
  }

  rotateWeeklyCode(code: string): WeeklyCode {
    this.weeklyCode = this.codeFrom(code);
    return { ...this.weeklyCode };
  }

  getWeeklyCode(): WeeklyCode {
    return { ...this.weeklyCode };
  }

  addProfessorAccount(username: string, password: string): void {
    this.professorCredentials.set(username, sha256(password));
  }

  getStudentRoster(): string[] {
    return [...this.roster].sort();
  }
}
