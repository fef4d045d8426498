import { Client } from 'ssh2'
import type { Duplex } from 'stream'
import { loadConfig, type NocGearConfig } from '../config'
import { CommandTimeoutError, ConnectionError, NocGearError, toErrorMessage } from '../errors'
import { silentLog, type LogFn } from '../types'
import type { Credentials, ShellConnector, ShellTransport } from './types'

// Strip ANSI escape codes and control characters from terminal output
export function stripControlChars(str: string): string {
  return str
    // Remove ANSI escape sequences (CSI sequences like ESC[...)
    .replace(/\x1b\[[0-9;?]*[a-zA-Z]/g, '')
    // Remove VT100 escape sequences (ESC followed by single char)
    .replace(/\x1b./g, '')
    .replace(/\r/g, '')
    .replace(/\x00/g, '')
    // Backspaces the pager uses to erase "--More--"
    .replace(/\x08/g, '')
}

// hostname>, hostname#, hostname(config-if)#
const PROMPT_LINE = /^[\w.-]+(\([\w-]+\))?[>#]\s*$/
const MORE_PROMPT = /--More--\s*$/
const MORE_MARKER = /[ \t]*--More--[ \t]*/g

function lastLine(text: string): string {
  const lines = text.split('\n')
  return lines[lines.length - 1] ?? ''
}

export interface SshShellTransportOptions {
  commandTimeoutMs: number
  livenessTimeoutMs: number
  log?: LogFn
  // Called once when the transport is closed, e.g. to end the SSH client
  onClose?: () => void
}

interface PendingRead {
  signals: readonly string[] | undefined
  resolve: (output: string) => void
  reject: (err: Error) => void
  timer: NodeJS.Timeout
}

/**
 * Interactive shell over a single channel.
 *
 * Commands are written one at a time; output is collected until a signal
 * string (or, by default, a prompt line) appears. Paged output is advanced
 * automatically. Calls queue behind each other, so there is never more than
 * one command in flight.
 */
export class SshShellTransport implements ShellTransport {
  private readonly stream: Duplex
  private readonly commandTimeoutMs: number
  private readonly livenessTimeoutMs: number
  private readonly log: LogFn
  private readonly onClose: (() => void) | undefined

  private buffer = ''
  private pending: PendingRead | null = null
  private closed = false
  private queue: Promise<unknown> = Promise.resolve()

  constructor(stream: Duplex, opts: SshShellTransportOptions) {
    this.stream = stream
    this.commandTimeoutMs = opts.commandTimeoutMs
    this.livenessTimeoutMs = opts.livenessTimeoutMs
    this.log = opts.log ?? silentLog
    this.onClose = opts.onClose

    stream.on('data', (data: Buffer | string) => {
      this.buffer += data.toString()
      this.checkPending()
    })

    stream.on('close', () => {
      this.closed = true
      this.failPending(new NocGearError('Shell channel closed'))
    })

    stream.on('error', (err: Error) => {
      this.log('error', `Shell stream error: ${err.message}`)
      this.failPending(err)
    })
  }

  get isClosed(): boolean {
    return this.closed
  }

  sendCommand(command: string, signals?: readonly string[]): Promise<string> {
    return this.exclusive(() => this.exchange(command, signals, this.commandTimeoutMs))
  }

  sendConfigSequence(lines: readonly string[]): Promise<void> {
    return this.exclusive(async () => {
      for (const line of lines) {
        await this.exchange(line, undefined, this.commandTimeoutMs)
      }
    })
  }

  async probeLiveness(): Promise<boolean> {
    if (this.closed) return false
    try {
      await this.exclusive(() => this.exchange('', undefined, this.livenessTimeoutMs))
      return true
    } catch (err) {
      this.log('warn', `Liveness probe failed: ${toErrorMessage(err)}`)
      return false
    }
  }

  async close(): Promise<void> {
    if (this.closed) return
    this.closed = true
    this.failPending(new NocGearError('Shell channel closed'))
    this.stream.end()
    this.onClose?.()
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task)
    this.queue = run.catch(() => undefined)
    return run
  }

  private exchange(command: string, signals: readonly string[] | undefined, timeoutMs: number): Promise<string> {
    if (this.closed) {
      return Promise.reject(new NocGearError('Shell channel closed'))
    }

    return new Promise((resolve, reject) => {
      // Anything left over belongs to the previous exchange
      this.buffer = ''
      const timer = setTimeout(() => {
        this.pending = null
        reject(new CommandTimeoutError(command, timeoutMs))
      }, timeoutMs)

      this.pending = { signals, resolve, reject, timer }
      this.stream.write(command + '\n')
    })
  }

  private checkPending(): void {
    const pending = this.pending
    if (!pending) return

    const clean = stripControlChars(this.buffer)

    // Pager waiting for a keypress
    if (MORE_PROMPT.test(lastLine(clean))) {
      this.stream.write(' ')
      return
    }

    const done = pending.signals
      ? pending.signals.some(signal => clean.includes(signal))
      : PROMPT_LINE.test(lastLine(clean))
    if (!done) return

    clearTimeout(pending.timer)
    this.pending = null
    pending.resolve(clean.replace(MORE_MARKER, ''))
  }

  private failPending(err: Error): void {
    const pending = this.pending
    if (!pending) return
    clearTimeout(pending.timer)
    this.pending = null
    pending.reject(err)
  }
}

export interface SshShellConnectorOptions {
  config?: NocGearConfig
}

// Opens an SSH connection with password auth and a PTY shell on it
export class SshShellConnector implements ShellConnector {
  private readonly config: NocGearConfig

  constructor(opts: SshShellConnectorOptions = {}) {
    this.config = opts.config ?? loadConfig()
  }

  connect(host: string, credentials: Credentials, log: LogFn = silentLog): Promise<ShellTransport> {
    const { ssh } = this.config

    return new Promise((resolve, reject) => {
      const client = new Client()
      let settled = false

      const fail = (err: ConnectionError) => {
        if (settled) return
        settled = true
        clearTimeout(timer)
        client.end()
        reject(err)
      }

      const timer = setTimeout(() => {
        fail(new ConnectionError(host, `Connection timed out after ${ssh.readyTimeoutMs}ms`))
      }, ssh.readyTimeoutMs + 1000)

      client.on('error', (err: Error & { level?: string }) => {
        if (settled) {
          log('error', `SSH client error on ${host}: ${err.message}`)
          return
        }
        // Auth failures have level 'client-authentication'
        const authFailed = err.level === 'client-authentication'
        fail(new ConnectionError(host, err.message, { authFailed, cause: err }))
      })

      client.on('ready', () => {
        log('info', `SSH connected to ${host}, requesting shell...`)

        client.shell({ term: 'vt100', rows: 24, cols: 200 }, (err, stream) => {
          if (err) {
            fail(new ConnectionError(host, `Shell error: ${err.message}`, { cause: err }))
            return
          }
          if (settled) {
            stream.end()
            return
          }

          settled = true
          clearTimeout(timer)
          log('info', `Shell channel opened on ${host}`)

          resolve(new SshShellTransport(stream, {
            commandTimeoutMs: ssh.commandTimeoutMs,
            livenessTimeoutMs: ssh.livenessTimeoutMs,
            log,
            onClose: () => client.end(),
          }))
        })
      })

      client.connect({
        host,
        port: ssh.port,
        username: credentials.username,
        password: credentials.password,
        readyTimeout: ssh.readyTimeoutMs,
        tryKeyboard: false,
        algorithms: {
          kex: [
            'curve25519-sha256',
            'curve25519-sha256@libssh.org',
            'ecdh-sha2-nistp256',
            'ecdh-sha2-nistp384',
            'ecdh-sha2-nistp521',
            'diffie-hellman-group-exchange-sha256',
            'diffie-hellman-group14-sha256',
            'diffie-hellman-group14-sha1',
            'diffie-hellman-group1-sha1',  // Older IOS images
          ],
          serverHostKey: [
            'ssh-ed25519',
            'ecdsa-sha2-nistp256',
            'ecdsa-sha2-nistp384',
            'ecdsa-sha2-nistp521',
            'rsa-sha2-512',
            'rsa-sha2-256',
            'ssh-rsa',
          ],
        },
      })
    })
  }
}
