import { ParseError } from '../errors'
import { INTERFACE_TOKEN, isPhysicalPort, shorthandPortNotation } from './ports'
import type { IpDeviceTrackingEntry, MacTableEntry, PoeStatusEntry, VlanEntry } from './types'

// Parsers for Catalyst IOS show-command output.
// Every function is pure: raw text in, fresh records out. Column positions
// follow the captured firmware output in src/__tests__/fixtures and are the
// contract these functions depend on.

// Cisco dotted MAC, e.g. 000b.7866.5240
const MAC_TOKEN = /\b[0-9a-f]{4}\.[0-9a-f]{4}\.[0-9a-f]{4}\b/i

const VLAN_ID = /^\d+$/

function splitLines(output: string): string[] {
  return output.split(/\r?\n/).map(line => line.trim())
}

function splitFields(line: string): string[] {
  return line.split(/\s+/).filter(Boolean)
}

function byInterface<T extends { readonly interface: string }>(a: T, b: T): number {
  if (a.interface < b.interface) return -1
  if (a.interface > b.interface) return 1
  return 0
}

// 000b.7866.5240 -> 00:0b:78:66:52:40
export function formatMac(dotted: string): string {
  return dotted
    .replace(/\./g, '')
    .toLowerCase()
    .replace(/(..)(?!$)/g, '$1:')
}

/**
 * Software version from `show version`.
 *
 *   Cisco IOS Software, C3750E Software (C3750E-UNIVERSALK9-M), Version 15.0(2)SE5, RELEASE SOFTWARE (fc1)
 */
export function parseVersion(output: string): string | null {
  const match = output.match(/\bVersion\s+([^\s,]+)/)
  return match ? match[1] : null
}

/**
 * `show mac address-table`
 *
 *           Mac Address Table
 *   -------------------------------------------
 *   Vlan    Mac Address       Type        Ports
 *   ----    -----------       --------    -----
 *    All    0100.0ccc.cccc    STATIC      CPU
 *    601    000b.7866.5240    DYNAMIC     Gi1/0/48
 *   Total Mac Addresses for this criterion: 59
 *
 * Entries on non-physical ports (CPU, port-channels) are dropped, as is
 * `ignorePort` when given (typically the uplink).
 */
export function parseMacAddressTable(output: string, ignorePort?: string): MacTableEntry[] {
  const ignore = shorthandPortNotation(ignorePort)
  const entries: MacTableEntry[] = []

  for (const line of splitLines(output)) {
    if (!MAC_TOKEN.test(line)) continue

    const values = splitFields(line)
    if (values.length < 4) {
      throw new ParseError('mac address-table', line, 4)
    }

    const port = shorthandPortNotation(values[3])
    if (!isPhysicalPort(port)) continue
    if (ignore && port === ignore) continue

    entries.push({ mac: formatMac(values[1]), interface: port })
  }

  return entries.sort(byInterface)
}

/**
 * `show ip device tracking all`
 *
 *   -------------------------------------------------------------------
 *     IP Address     MAC Address   Vlan  Interface              STATE
 *   -------------------------------------------------------------------
 *   192.168.1.12     6cec.eb68.c86f  601  GigabitEthernet1/0/14  ACTIVE
 *
 * Only ACTIVE bindings are kept; anything else is stale.
 */
export function parseIpDeviceTracking(output: string): IpDeviceTrackingEntry[] {
  const entries: IpDeviceTrackingEntry[] = []

  for (const line of splitLines(output)) {
    if (!MAC_TOKEN.test(line)) continue

    const values = splitFields(line)
    if (values.length < 5) {
      throw new ParseError('ip device tracking', line, 5)
    }

    if (values[4] !== 'ACTIVE') continue

    entries.push({
      ip: values[0],
      mac: formatMac(values[1]),
      vlan: Number.parseInt(values[2], 10),
      interface: shorthandPortNotation(values[3]),
    })
  }

  return entries.sort(byInterface)
}

/**
 * `show power inline [port]`
 *
 *   Interface Admin  Oper       Power   Device              Class Max
 *                               (Watts)
 *   --------- ------ ---------- ------- ------------------- ----- ----
 *   Gi1/0/1   auto   on         15.4    IP Phone 7960       3     30.0
 *
 * The device column may contain spaces, so the max column is read from the end.
 */
export function parsePowerInline(output: string): PoeStatusEntry[] {
  const entries: PoeStatusEntry[] = []

  for (const line of splitLines(output)) {
    const values = splitFields(line)
    if (values.length === 0 || !INTERFACE_TOKEN.test(values[0])) continue

    if (values.length < 7) {
      throw new ParseError('power inline', line, 7)
    }

    entries.push({
      interface: shorthandPortNotation(values[0]),
      adminState: values[1],
      operState: values[2],
      watts: Number.parseFloat(values[3]),
      maxMilliwatts: Math.round(Number.parseFloat(values[values.length - 1]) * 1000),
    })
  }

  return entries.sort(byInterface)
}

// Matched PoE row for one port, or null when the port is not in the output
export function findPoeStatus(output: string, port: string): PoeStatusEntry | null {
  const shorthand = shorthandPortNotation(port)
  return parsePowerInline(output).find(entry => entry.interface === shorthand) ?? null
}

function toPortList(tokens: readonly string[]): string[] {
  return tokens
    .join(' ')
    .split(',')
    .map(port => port.trim())
    .filter(Boolean)
    .map(port => shorthandPortNotation(port))
}

function isPortList(tokens: readonly string[]): boolean {
  return tokens.every(token => INTERFACE_TOKEN.test(token.replace(/,$/, '')))
}

/**
 * `show vlan brief`
 *
 *   VLAN Name                             Status    Ports
 *   ---- -------------------------------- --------- -------------------------------
 *   1    default                          active    Gi1/0/3, Gi1/0/4, Gi1/0/5
 *                                                   Gi1/0/6
 *   701  NET-701                          active    Gi1/0/1, Gi1/0/2
 *   1002 fddi-default                     act/unsup
 *
 * A line starting with a VLAN id carries the VLAN; a line made only of ports
 * continues the most recent one.
 */
export function parseVlanBrief(output: string): VlanEntry[] {
  const vlans = splitLines(output).reduce<VlanEntry[]>((acc, line) => {
    const values = splitFields(line)
    if (values.length === 0) return acc

    if (VLAN_ID.test(values[0])) {
      if (values.length < 3) {
        throw new ParseError('vlan brief', line, 3)
      }
      return [...acc, {
        vlanId: Number.parseInt(values[0], 10),
        name: values[1],
        status: values[2],
        interfaces: toPortList(values.slice(3)),
      }]
    }

    const current = acc[acc.length - 1]
    if (current && isPortList(values)) {
      return [...acc.slice(0, -1), {
        ...current,
        interfaces: [...current.interfaces, ...toPortList(values)],
      }]
    }

    return acc
  }, [])

  return vlans.sort((a, b) => a.vlanId - b.vlanId)
}

/**
 * Check whether `port` is a member of `vlanId`.
 * Returns the verdict and the VLAN the port was actually found in (-1 if none).
 */
export function verifyVlan(output: string, port: string, vlanId: number): [boolean, number] {
  const shorthand = shorthandPortNotation(port)
  const owner = parseVlanBrief(output).find(vlan => vlan.interfaces.includes(shorthand))
  const observed = owner ? owner.vlanId : -1
  return [observed === vlanId, observed]
}
