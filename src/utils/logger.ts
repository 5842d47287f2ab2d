import pino from "pino";

const level = process.env.LOG_LEVEL || (process.env.NODE_ENV === "production" ? "info" : "debug");

export const logger = pino({
  level,
  redact: {
    paths: [
      "req.headers.authorization",
      "req.headers.cookie",
      "GOOGLE_API_KEY",
      "PROFESSOR_PASSWORD",
      "password",
      "access_code"
    ],
    remove: true
  }
});
