import { describe, expect, it } from 'vitest'
import { loadConfig, parseEnvInt } from '../services/config'

describe('parseEnvInt', () => {
  it('parses integers and falls back on anything else', () => {
    expect(parseEnvInt('2222', 22)).toBe(2222)
    expect(parseEnvInt('0', 5)).toBe(0)
    expect(parseEnvInt(undefined, 22)).toBe(22)
    expect(parseEnvInt('  ', 22)).toBe(22)
    expect(parseEnvInt('fast', 22)).toBe(22)
    expect(parseEnvInt('-5', 22)).toBe(22)
  })
})

describe('loadConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      ssh: { port: 22, readyTimeoutMs: 15000, commandTimeoutMs: 10000, livenessTimeoutMs: 2000 },
      snmp: { timeoutMs: 1500, retries: 2 },
      outletPoll: { timeoutMs: 15000, intervalMs: 1000 },
    })
  })

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      NOC_SSH_PORT: '2222',
      NOC_COMMAND_TIMEOUT_MS: '30000',
      NOC_SNMP_RETRIES: 'none',
      NOC_OUTLET_POLL_INTERVAL_MS: '250',
    })

    expect(config.ssh.port).toBe(2222)
    expect(config.ssh.commandTimeoutMs).toBe(30000)
    expect(config.snmp.retries).toBe(2)
    expect(config.outletPoll.intervalMs).toBe(250)
  })
})
