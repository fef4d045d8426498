// Catalyst IOS command dialect

export const CMD_ENABLE = 'enable'
export const ENABLE_SIGNALS = ['Password'] as const
// After the secret: a prompt, or another password request when it was wrong
export const ENABLE_SECRET_SIGNALS = ['>', '#', 'Password'] as const
export const ENABLE_MAX_ATTEMPTS = 3

export const CMD_TERMINAL_LENGTH = 'terminal length 0'

export const CMD_VERSION = 'show version'
export const CMD_IPDT = 'show ip device tracking all'
export const CMD_MAC_ADDRESS_TABLE = 'show mac address-table'
export const CMD_VLAN_BRIEF = 'show vlan brief'
export const CMD_POWER_INLINE = (port: string) => `show power inline ${port}`

export const CMD_CONFIGURE = 'configure terminal'
export const CMD_CONFIGURE_INTERFACE = (port: string) => `interface ${port}`
export const CMD_EXIT = 'exit'

export const CMD_POWER_ON = 'power inline auto'
export const CMD_POWER_OFF = 'power inline never'
export const CMD_POWER_LIMIT = (mode: string, milliwatts: number) => `power inline ${mode} max ${milliwatts}`

export const CMD_SWITCHPORT_ACCESS = 'switchport mode access'
export const CMD_SWITCHPORT_VLAN = (vlanId: number) => `switchport access vlan ${vlanId}`

// Limits accepted by `power inline ... max`
export const POE_MIN_MILLIWATTS = 4000
export const POE_MAX_MILLIWATTS = 30000

export const VLAN_MIN = 1
export const VLAN_MAX = 4094

// configure terminal -> interface context -> commands -> back to EXEC
export function interfaceConfig(port: string, ...commands: string[]): string[] {
  return [CMD_CONFIGURE, CMD_CONFIGURE_INTERFACE(port), ...commands, CMD_EXIT, CMD_EXIT]
}
