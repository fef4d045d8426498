// Env-driven tunables for transports and polling

export interface NocGearConfig {
  ssh: {
    port: number
    readyTimeoutMs: number
    commandTimeoutMs: number
    livenessTimeoutMs: number
  }
  snmp: {
    timeoutMs: number
    retries: number
  }
  outletPoll: {
    timeoutMs: number
    intervalMs: number
  }
}

type Env = Record<string, string | undefined>

export function parseEnvInt(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') return fallback
  const n = Number.parseInt(raw, 10)
  return Number.isFinite(n) && n >= 0 ? n : fallback
}

export function loadConfig(env: Env = process.env): NocGearConfig {
  return {
    ssh: {
      port: parseEnvInt(env.NOC_SSH_PORT, 22),
      readyTimeoutMs: parseEnvInt(env.NOC_SSH_READY_TIMEOUT_MS, 15000),
      commandTimeoutMs: parseEnvInt(env.NOC_COMMAND_TIMEOUT_MS, 10000),
      livenessTimeoutMs: parseEnvInt(env.NOC_LIVENESS_TIMEOUT_MS, 2000),
    },
    snmp: {
      timeoutMs: parseEnvInt(env.NOC_SNMP_TIMEOUT_MS, 1500),
      retries: parseEnvInt(env.NOC_SNMP_RETRIES, 2),
    },
    outletPoll: {
      timeoutMs: parseEnvInt(env.NOC_OUTLET_POLL_TIMEOUT_MS, 15000),
      intervalMs: parseEnvInt(env.NOC_OUTLET_POLL_INTERVAL_MS, 1000),
    },
  }
}
