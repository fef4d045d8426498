import { loadConfig, type NocGearConfig } from '../config'
import { InvalidArgumentError } from '../errors'
import { silentLog, type LogFn } from '../types'
import {
  CMD_IPDT,
  CMD_MAC_ADDRESS_TABLE,
  CMD_POWER_INLINE,
  CMD_POWER_LIMIT,
  CMD_POWER_OFF,
  CMD_POWER_ON,
  CMD_SWITCHPORT_ACCESS,
  CMD_SWITCHPORT_VLAN,
  CMD_VERSION,
  CMD_VLAN_BRIEF,
  POE_MAX_MILLIWATTS,
  POE_MIN_MILLIWATTS,
  VLAN_MAX,
  VLAN_MIN,
  interfaceConfig,
} from './cisco-commands'
import {
  findPoeStatus,
  parseIpDeviceTracking,
  parseMacAddressTable,
  parseVersion,
  parseVlanBrief,
  verifyVlan,
} from './cisco-parsers'
import { shorthandPortNotation } from './ports'
import { Session } from './session'
import { SshShellConnector } from './ssh-shell'
import type {
  IpDeviceTrackingEntry,
  MacTableEntry,
  PoeMode,
  PoeStatusEntry,
  SessionState,
  ShellConnector,
} from './types'

const POE_MODES: readonly PoeMode[] = ['auto', 'static']

export interface CiscoSwitchOptions {
  // Defaults to an SSH connector built from `config`
  connector?: ShellConnector
  config?: NocGearConfig
  log?: LogFn
}

function requirePort(port: string): string {
  const shorthand = shorthandPortNotation(port.trim())
  if (!shorthand) {
    throw new InvalidArgumentError('Port name is required')
  }
  return shorthand
}

/**
 * Catalyst switch control.
 *
 * Mutations follow apply-then-verify: the configuration is sent, the
 * authoritative table is read back, and the result says whether the
 * intended state was observed. A rejected or ignored command shows up as
 * `false`, never as an exception.
 */
export class CiscoSwitch {
  private readonly session: Session
  private readonly log: LogFn
  private cachedVersion: string | null = null

  constructor(host: string, username: string, password: string, opts: CiscoSwitchOptions = {}) {
    this.log = opts.log ?? silentLog
    const connector = opts.connector ?? new SshShellConnector({ config: opts.config ?? loadConfig() })
    this.session = new Session(host, { username, password }, connector, this.log)
  }

  get host(): string {
    return this.session.host
  }

  get state(): SessionState {
    return this.session.sessionState
  }

  /* ---------------------------------------------------------------------- */
  /*  Lifecycle                                                             */
  /* ---------------------------------------------------------------------- */

  async connect(): Promise<void> {
    this.cachedVersion = null
    await this.session.connect()
  }

  enable(secret: string): Promise<boolean> {
    return this.session.enable(secret)
  }

  setTerminalLength(): Promise<boolean> {
    return this.session.setTerminalLength()
  }

  isConnected(): Promise<boolean> {
    return this.session.isConnected()
  }

  async disconnect(): Promise<void> {
    this.cachedVersion = null
    await this.session.disconnect()
  }

  /* ---------------------------------------------------------------------- */
  /*  Reads                                                                 */
  /* ---------------------------------------------------------------------- */

  // Software version, read once per connection
  async version(): Promise<string | null> {
    // A dropped channel counts as a new connection
    if (!this.session.ready) this.cachedVersion = null
    if (this.cachedVersion !== null) return this.cachedVersion

    const output = await this.session.runQuery(CMD_VERSION)
    if (output === null) return null

    this.cachedVersion = parseVersion(output)
    return this.cachedVersion
  }

  // IP device tracking bindings; null when not connected
  async ipdt(): Promise<IpDeviceTrackingEntry[] | null> {
    const output = await this.session.runQuery(CMD_IPDT)
    return output === null ? null : parseIpDeviceTracking(output)
  }

  // MAC address table, optionally without one port (e.g. Gi1/0/48 uplink)
  async macAddressTable(ignorePort?: string): Promise<MacTableEntry[] | null> {
    const output = await this.session.runQuery(CMD_MAC_ADDRESS_TABLE)
    return output === null ? null : parseMacAddressTable(output, ignorePort)
  }

  // Access VLAN of a port, -1 when unknown or not connected
  async vlan(port: string): Promise<number> {
    const shorthand = requirePort(port)
    const output = await this.session.runQuery(CMD_VLAN_BRIEF)
    if (output === null) return -1

    const owner = parseVlanBrief(output).find(vlan => vlan.interfaces.includes(shorthand))
    return owner ? owner.vlanId : -1
  }

  async poeStatus(port: string): Promise<PoeStatusEntry | null> {
    const shorthand = requirePort(port)
    const output = await this.session.runQuery(CMD_POWER_INLINE(shorthand))
    return output === null ? null : findPoeStatus(output, shorthand)
  }

  /**
   * Whether PoE is administratively enabled on a port.
   * @deprecated Use {@link CiscoSwitch.poeStatus}, which returns the full row.
   */
  async isPoe(port: string): Promise<boolean | 'unknown'> {
    const status = await this.poeStatus(port)
    if (!status) return 'unknown'
    return status.adminState.includes('auto') || status.adminState.includes('static')
  }

  /* ---------------------------------------------------------------------- */
  /*  Mutations (apply, then verify)                                        */
  /* ---------------------------------------------------------------------- */

  async poeOn(port: string): Promise<boolean> {
    const shorthand = requirePort(port)
    return this.applyAndVerify(`PoE on ${shorthand}`, interfaceConfig(shorthand, CMD_POWER_ON), async () => {
      const status = await this.poeStatus(shorthand)
      return status !== null && status.adminState.includes('auto')
    })
  }

  async poeOff(port: string): Promise<boolean> {
    const shorthand = requirePort(port)
    return this.applyAndVerify(`PoE off ${shorthand}`, interfaceConfig(shorthand, CMD_POWER_OFF), async () => {
      const status = await this.poeStatus(shorthand)
      return status !== null && !status.adminState.includes('auto')
    })
  }

  // Cap the power drawn on a port; `mode` is the admin mode kept while capped
  async poeLimit(port: string, milliwatts: number, mode: PoeMode = 'static'): Promise<boolean> {
    const shorthand = requirePort(port)
    if (!POE_MODES.includes(mode)) {
      throw new InvalidArgumentError(`Unknown PoE mode "${mode}", expected one of ${POE_MODES.join(', ')}`)
    }
    if (!Number.isInteger(milliwatts) || milliwatts < POE_MIN_MILLIWATTS || milliwatts > POE_MAX_MILLIWATTS) {
      throw new InvalidArgumentError(`PoE limit must be an integer between ${POE_MIN_MILLIWATTS} and ${POE_MAX_MILLIWATTS} mW`)
    }

    const lines = interfaceConfig(shorthand, CMD_POWER_LIMIT(mode, milliwatts))
    return this.applyAndVerify(`PoE limit ${shorthand} ${mode} ${milliwatts}mW`, lines, async () => {
      const status = await this.poeStatus(shorthand)
      return status !== null && status.adminState.includes(mode)
    })
  }

  // Make a port an access port on `vlanId`
  async changeVlan(port: string, vlanId: number): Promise<boolean> {
    const shorthand = requirePort(port)
    if (!Number.isInteger(vlanId) || vlanId < VLAN_MIN || vlanId > VLAN_MAX) {
      throw new InvalidArgumentError(`VLAN id must be an integer between ${VLAN_MIN} and ${VLAN_MAX}`)
    }

    const lines = interfaceConfig(shorthand, CMD_SWITCHPORT_ACCESS, CMD_SWITCHPORT_VLAN(vlanId))
    return this.applyAndVerify(`VLAN ${vlanId} on ${shorthand}`, lines, async () => {
      const output = await this.session.runQuery(CMD_VLAN_BRIEF)
      if (output === null) return false
      const [matches, observed] = verifyVlan(output, shorthand, vlanId)
      if (!matches) this.log('info', `${shorthand} observed in VLAN ${observed}`)
      return matches
    })
  }

  private async applyAndVerify(label: string, lines: string[], verify: () => Promise<boolean>): Promise<boolean> {
    if (!(await this.session.runConfig(lines))) return false

    const confirmed = await verify()
    if (confirmed) {
      this.log('success', `${label}: confirmed on ${this.host}`)
    } else {
      this.log('warn', `${label}: not confirmed on ${this.host}`)
    }
    return confirmed
  }
}
