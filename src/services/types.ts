// Shared types for the device services

export type LogLevel = 'info' | 'success' | 'warn' | 'error'

// Injected event sink - drivers never reach for a process-wide logger
export type LogFn = (level: LogLevel, message: string, extra?: Record<string, unknown>) => void

// Default sink when the caller does not care
export const silentLog: LogFn = () => {}
