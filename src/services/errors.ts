/**
 * Error taxonomy for device control.
 *
 * Only connection failures, parse failures, invalid arguments and transport
 * faults are thrown. "Not connected" and "verification did not match" are
 * ordinary return values.
 */

export class NocGearError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

// Authentication failure, unreachable host, shell could not be opened
export class ConnectionError extends NocGearError {
  readonly host: string
  readonly authFailed: boolean

  constructor(host: string, message: string, options?: { authFailed?: boolean; cause?: unknown }) {
    super(`${host}: ${message}`, { cause: options?.cause })
    this.host = host
    this.authFailed = options?.authFailed ?? false
  }
}

// No terminal marker arrived before the command deadline
export class CommandTimeoutError extends NocGearError {
  readonly command: string
  readonly timeoutMs: number

  constructor(command: string, timeoutMs: number) {
    super(`Command "${command}" timed out after ${timeoutMs}ms`)
    this.command = command
    this.timeoutMs = timeoutMs
  }
}

// A row matched a table fingerprint but is missing fields
export class ParseError extends NocGearError {
  readonly table: string
  readonly line: string

  constructor(table: string, line: string, expectedFields: number) {
    super(`Malformed ${table} row (expected at least ${expectedFields} fields): "${line}"`)
    this.table = table
    this.line = line
  }
}

export class InvalidArgumentError extends NocGearError {}

export class SnmpError extends NocGearError {
  readonly address: string

  constructor(address: string, message: string, options?: { cause?: unknown }) {
    super(`SNMP ${address}: ${message}`, options)
    this.address = address
  }
}

export class PduNotLoadedError extends NocGearError {
  constructor(host: string) {
    super(`${host}: PDU identity not loaded, call load() first`)
  }
}

// Render anything thrown for a log line
export function toErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message
  return String(err)
}
