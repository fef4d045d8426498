// Driver registry - exports all drivers and shared types

export * from './types'
export { CiscoSwitch, type CiscoSwitchOptions } from './cisco'
export { ApcPdu, type ApcPduOptions, type PduIdentity, type OutletOperation, type OutletStatus } from './apc'
export { Session } from './session'
export { SshShellConnector, SshShellTransport, stripControlChars } from './ssh-shell'
export { NetSnmpClient, resolveAddress } from './apc-snmp'
export { shorthandPortNotation, isPhysicalPort, PORT_NOTATION } from './ports'
export {
  formatMac,
  parseVersion,
  parseMacAddressTable,
  parseIpDeviceTracking,
  parsePowerInline,
  findPoeStatus,
  parseVlanBrief,
  verifyVlan,
} from './cisco-parsers'

import { ApcPdu, type ApcPduOptions } from './apc'
import { CiscoSwitch, type CiscoSwitchOptions } from './cisco'

// Switches log in with a username/password, PDUs with two SNMP communities
export interface DriverFactories {
  'cisco-ios': (host: string, username: string, password: string, opts?: CiscoSwitchOptions) => CiscoSwitch
  'apc-rpdu2': (host: string, publicCommunity: string, privateCommunity: string, opts?: ApcPduOptions) => ApcPdu
}

export type DriverName = keyof DriverFactories

// Registry of all available drivers by name
export const drivers: DriverFactories = {
  'cisco-ios': (host, username, password, opts) => new CiscoSwitch(host, username, password, opts),
  'apc-rpdu2': (host, publicCommunity, privateCommunity, opts) => new ApcPdu(host, publicCommunity, privateCommunity, opts),
}

export function isDriverName(name: string): name is DriverName {
  return Object.hasOwn(drivers, name)
}

// Get driver by name
export function getDriver<N extends DriverName>(name: N): DriverFactories[N]
export function getDriver(name: string): DriverFactories[DriverName] | undefined
export function getDriver(name: string): DriverFactories[DriverName] | undefined {
  return isDriverName(name) ? drivers[name] : undefined
}
