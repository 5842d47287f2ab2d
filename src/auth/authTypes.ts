export type UserRole = "professor" | "student" | "guest";

export interface AuthSession {
  token: string;
  role: UserRole;
  user_id: string;
  issued_at: string;
}

export type LoginInput =
  | { role: "guest"; user_id?: string }
  | { role: "student"; user_id: string; access_code: string }
  | { role: "professor"; user_id: string; password: string };

export interface WeeklyCode {
  current: string;
  expires_at: string;
}
