import { describe, expect, it } from 'vitest'
import { isPhysicalPort, shorthandPortNotation } from '../services/drivers/ports'

describe('shorthandPortNotation', () => {
  it('shortens long interface names', () => {
    expect(shorthandPortNotation('GigabitEthernet1/0/48')).toBe('Gi1/0/48')
    expect(shorthandPortNotation('FastEthernet0/3')).toBe('Fa0/3')
    expect(shorthandPortNotation('TenGigabitEthernet1/1/1')).toBe('Ten1/1/1')
  })

  it('matches the prefix case-insensitively and keeps the remainder', () => {
    expect(shorthandPortNotation('gigabitethernet2/0/1.100')).toBe('Gi2/0/1.100')
  })

  it('is idempotent', () => {
    const once = shorthandPortNotation('GigabitEthernet1/0/14')
    expect(shorthandPortNotation(once)).toBe(once)
  })

  it('passes through names it does not know', () => {
    expect(shorthandPortNotation('Port-channel1')).toBe('Port-channel1')
    expect(shorthandPortNotation('CPU')).toBe('CPU')
    expect(shorthandPortNotation('')).toBe('')
    expect(shorthandPortNotation(undefined)).toBeUndefined()
    expect(shorthandPortNotation(null)).toBeNull()
  })
})

describe('isPhysicalPort', () => {
  it('accepts Ethernet ports in either notation', () => {
    expect(isPhysicalPort('Gi1/0/48')).toBe(true)
    expect(isPhysicalPort('FastEthernet0/1')).toBe(true)
    expect(isPhysicalPort('Ten1/1/2')).toBe(true)
  })

  it('rejects CPU, port-channels and VLAN interfaces', () => {
    expect(isPhysicalPort('CPU')).toBe(false)
    expect(isPhysicalPort('Po1')).toBe(false)
    expect(isPhysicalPort('Vlan701')).toBe(false)
  })
})
