import { nanoid } from 'nanoid'
import { ConnectionError, toErrorMessage } from '../errors'
import { silentLog, type LogFn } from '../types'
import {
  CMD_ENABLE,
  CMD_TERMINAL_LENGTH,
  ENABLE_MAX_ATTEMPTS,
  ENABLE_SECRET_SIGNALS,
  ENABLE_SIGNALS,
} from './cisco-commands'
import type { Credentials, PrivilegeLevel, SessionState, ShellConnector, ShellTransport } from './types'

function promptOf(output: string): string {
  const lines = output.trimEnd().split('\n')
  return (lines[lines.length - 1] ?? '').trim()
}

/**
 * One logical connection to one switch.
 *
 *   disconnected -> unprivileged -> privileged
 *        ^______________|_______________|   (disconnect)
 *
 * The transport is owned here and nowhere else. Queries and configuration
 * run only once the session is privileged; otherwise they return null/false.
 *
 * Disconnecting while a configuration sequence is in flight can leave the
 * device half-configured; callers must not do that.
 */
export class Session {
  readonly id = nanoid(10)
  readonly host: string

  private readonly credentials: Readonly<Credentials>
  private readonly connector: ShellConnector
  private readonly log: LogFn

  private transport: ShellTransport | null = null
  private state: SessionState = 'disconnected'

  constructor(host: string, credentials: Credentials, connector: ShellConnector, log: LogFn = silentLog) {
    this.host = host
    this.credentials = { ...credentials }
    this.connector = connector
    this.log = log
  }

  get sessionState(): SessionState {
    return this.state
  }

  get privilegeLevel(): PrivilegeLevel | null {
    return this.state === 'disconnected' ? null : this.state
  }

  // Commands may be issued
  get ready(): boolean {
    return this.state === 'privileged' && this.transport !== null && !this.transport.isClosed
  }

  // The remote end can drop the channel at any time; forget it once it has
  private dropClosedTransport(): void {
    if (!this.transport || !this.transport.isClosed) return
    this.transport = null
    this.state = 'disconnected'
    this.log('warn', `Shell channel to ${this.host} closed by the remote end`, { session: this.id })
  }

  async connect(): Promise<void> {
    this.dropClosedTransport()
    if (this.transport) return

    let transport: ShellTransport
    try {
      transport = await this.connector.connect(this.host, this.credentials, this.log)
    } catch (err) {
      this.log('error', `Connection to ${this.host} failed: ${toErrorMessage(err)}`, { session: this.id })
      if (err instanceof ConnectionError) throw err
      throw new ConnectionError(this.host, toErrorMessage(err), { cause: err })
    }

    let banner: string
    try {
      // Read to a full prompt line; MOTD banners are often drawn with '#'
      banner = await transport.sendCommand('')
    } catch (err) {
      await transport.close()
      this.log('error', `No login prompt from ${this.host}: ${toErrorMessage(err)}`, { session: this.id })
      throw new ConnectionError(this.host, `No login prompt: ${toErrorMessage(err)}`, { cause: err })
    }

    this.transport = transport
    // '>' means user EXEC and an enable is needed
    this.state = promptOf(banner).endsWith('#') ? 'privileged' : 'unprivileged'
    this.log('success', `Connected to ${this.host} (${this.state})`, { session: this.id })
  }

  /**
   * Escalate to privileged EXEC. A no-op unless the session is connected and
   * still unprivileged. Resolves with whether the session is now ready.
   */
  async enable(secret: string): Promise<boolean> {
    this.dropClosedTransport()
    const transport = this.transport
    if (!transport || this.state !== 'unprivileged') return this.ready

    await transport.sendCommand(CMD_ENABLE, ENABLE_SIGNALS)
    let output = await transport.sendCommand(secret, ENABLE_SECRET_SIGNALS)

    // Wrong secret: IOS asks again until its attempts run out, then drops
    // back to the user prompt. Answer with blanks to get there.
    for (let attempt = 1; attempt < ENABLE_MAX_ATTEMPTS && promptOf(output).includes('Password'); attempt++) {
      output = await transport.sendCommand('', ENABLE_SECRET_SIGNALS)
    }

    if (promptOf(output).endsWith('#')) {
      this.state = 'privileged'
      this.log('success', `Privileged mode on ${this.host}`, { session: this.id })
      return true
    }

    this.log('warn', `Enable rejected by ${this.host}`, { session: this.id })
    return false
  }

  // Disable paging so tables arrive in one piece
  async setTerminalLength(): Promise<boolean> {
    const output = await this.runQuery(CMD_TERMINAL_LENGTH)
    return output !== null
  }

  // Raw command output, or null when not ready or the channel drops mid-command
  async runQuery(command: string, signals?: readonly string[]): Promise<string | null> {
    this.dropClosedTransport()
    const transport = this.transport
    if (!transport || !this.ready) return null

    try {
      return await transport.sendCommand(command, signals)
    } catch (err) {
      if (!transport.isClosed) throw err
      this.dropClosedTransport()
      return null
    }
  }

  // False when not ready; otherwise every line has been sent
  async runConfig(lines: readonly string[]): Promise<boolean> {
    this.dropClosedTransport()
    const transport = this.transport
    if (!transport || !this.ready) return false

    this.log('info', `Configuring ${this.host}: ${lines.join(' | ')}`, { session: this.id })
    try {
      await transport.sendConfigSequence(lines)
      return true
    } catch (err) {
      if (!transport.isClosed) throw err
      this.dropClosedTransport()
      return false
    }
  }

  // Active check: the remote end can go away without telling us.
  // A probe that times out on a live channel leaves the state alone.
  async isConnected(): Promise<boolean> {
    this.dropClosedTransport()
    const transport = this.transport
    if (!transport) return false

    const alive = await transport.probeLiveness()
    if (!alive) this.dropClosedTransport()
    return alive
  }

  async disconnect(): Promise<void> {
    const transport = this.transport
    this.transport = null
    this.state = 'disconnected'
    if (!transport) return

    await transport.close()
    this.log('info', `Disconnected from ${this.host}`, { session: this.id })
  }
}
