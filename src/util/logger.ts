import tracer from "tracer"

export const LOG_LEVELS = ["log", "trace", "debug", "info", "warn", "error"] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

/**
 * Plugin logger — writes to stderr exclusively.
 * stdout is reserved for the CodeGeneratorResponse wire payload.
 */
export const log = tracer.colorConsole({
  level: "info",
  format: "{{timestamp}} [{{title}}] {{file}}:{{line}} — {{message}}",
  dateformat: "HH:MM:ss.L",
  transport: function (data) {
    process.stderr.write(data.output + "\n")
  }
})

export function isLogLevel(level: string): level is LogLevel {
  return LOG_LEVELS.some(l => l === level)
}

/** Set log level at runtime (e.g. via plugin parameter) */
export function setLogLevel(level: string): void {
  if (isLogLevel(level)) {
    tracer.setLevel(level)
  } else {
    log.warn("Ignoring unknown log level %s", level)
  }
}
