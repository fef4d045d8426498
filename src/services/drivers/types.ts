import type { LogFn } from '../types'

export type { LogFn, LogLevel } from '../types'

export interface Credentials {
  username: string
  password: string
}

// ---------------------------------------------------------------------------
// Transport collaborators
// ---------------------------------------------------------------------------

// One interactive shell on one device. Exchanges are strictly sequential.
export interface ShellTransport {
  // Write `command` and resolve with the text received until one of `signals`
  // shows up, or until a prompt line comes back when no signals are given
  sendCommand(command: string, signals?: readonly string[]): Promise<string>
  // Send configuration lines one by one, each waiting for its prompt
  sendConfigSequence(lines: readonly string[]): Promise<void>
  // Active check against the live channel
  probeLiveness(): Promise<boolean>
  // True once either end has closed the channel
  readonly isClosed: boolean
  close(): Promise<void>
}

export interface ShellConnector {
  connect(host: string, credentials: Credentials, log?: LogFn): Promise<ShellTransport>
}

export type SnmpScalar = string | number

// Addresses are opaque catalog keys such as "PowerNet-MIB::rPDU2IdentName.1"
export interface SnmpClient {
  get(address: string): Promise<SnmpScalar>
  set(address: string, value: SnmpScalar): Promise<void>
  close(): void
}

// ---------------------------------------------------------------------------
// Session state
// ---------------------------------------------------------------------------

export type PrivilegeLevel = 'unprivileged' | 'privileged'

export type SessionState = 'disconnected' | PrivilegeLevel

// ---------------------------------------------------------------------------
// Parsed table records (interface names are always shorthand)
// ---------------------------------------------------------------------------

export interface MacTableEntry {
  readonly mac: string
  readonly interface: string
}

export interface IpDeviceTrackingEntry {
  readonly ip: string
  readonly mac: string
  readonly vlan: number
  readonly interface: string
}

export interface PoeStatusEntry {
  readonly interface: string
  readonly adminState: string
  readonly operState: string
  readonly watts: number
  readonly maxMilliwatts: number
}

export interface VlanEntry {
  readonly vlanId: number
  readonly name: string
  readonly status: string
  readonly interfaces: readonly string[]
}

export type PoeMode = 'auto' | 'static'
