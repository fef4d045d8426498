// Long-form interface names and their shorthand, longest prefix first
export const PORT_NOTATION: ReadonlyArray<readonly [string, string]> = [
  ['tengigabitethernet', 'Ten'],
  ['gigabitethernet', 'Gi'],
  ['fastethernet', 'Fa'],
]

const PHYSICAL_PREFIXES = PORT_NOTATION.map(([, short]) => short.toLowerCase())

// Slot/port notation, e.g. Gi1/0/48 or GigabitEthernet1/0/48
export const INTERFACE_TOKEN = /^[A-Za-z][A-Za-z-]*\d+(\/\d+)+(\.\d+)?$/

/**
 * Shorthand port notation: GigabitEthernet1/0/48 -> Gi1/0/48.
 * Prefix match is case-insensitive; names that match no long form
 * (including ones already in shorthand) come back unchanged.
 *
 * Used both when building commands and when matching parsed output,
 * so the two always agree.
 */
export function shorthandPortNotation(port: string): string
export function shorthandPortNotation(port: string | null | undefined): string | null | undefined
export function shorthandPortNotation(port: string | null | undefined): string | null | undefined {
  if (!port) return port

  const lower = port.toLowerCase()
  for (const [long, short] of PORT_NOTATION) {
    if (lower.startsWith(long)) {
      return short + port.slice(long.length)
    }
  }
  return port
}

// CPU, port-channels, VLAN interfaces etc. are not physical ports
export function isPhysicalPort(port: string): boolean {
  const lower = shorthandPortNotation(port).toLowerCase()
  return PHYSICAL_PREFIXES.some(prefix => lower.startsWith(prefix))
}
