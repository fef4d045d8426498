/**
 * net-snmp client for PDUs addressed through the PowerNet-MIB catalog
 */

import * as snmp from 'net-snmp'
import catalog from './powernet-mib.json'
import { SnmpError } from '../errors'
import type { SnmpClient, SnmpScalar } from './types'

const SYMBOLS: Record<string, string> = catalog.symbols

// "PowerNet-MIB::rPDU2OutletSwitchedStatusState.3" -> "1.3.6.1.4.1.318.1.1.26.9.2.3.1.5.3"
export function resolveAddress(address: string): string {
  const match = address.match(/^(?:([\w-]+)::)?(\w+)\.(\d+)$/)
  if (!match) {
    throw new SnmpError(address, 'Malformed address')
  }

  const [, module, symbol, index] = match
  if (module && module !== catalog.module) {
    throw new SnmpError(address, `Unknown MIB module ${module}`)
  }

  const oid = SYMBOLS[symbol]
  if (!oid) {
    throw new SnmpError(address, `Unknown symbol ${symbol}`)
  }
  return `${oid}.${index}`
}

function toScalar(address: string, value: unknown): SnmpScalar {
  if (typeof value === 'number') return value
  if (typeof value === 'string') return value
  if (typeof value === 'bigint') return Number(value)
  if (Buffer.isBuffer(value)) return value.toString()
  throw new SnmpError(address, `Unsupported value type ${typeof value}`)
}

export interface NetSnmpClientOptions {
  timeoutMs: number
  retries: number
}

// Reads go out on the public community, writes on the private one
export class NetSnmpClient implements SnmpClient {
  private readonly readSession: ReturnType<typeof snmp.createSession>
  private readonly writeSession: ReturnType<typeof snmp.createSession>

  constructor(host: string, publicCommunity: string, privateCommunity: string, opts: NetSnmpClientOptions) {
    const sessionOptions = {
      timeout: opts.timeoutMs,
      retries: opts.retries,
      version: snmp.Version2c,
    }
    this.readSession = snmp.createSession(host, publicCommunity, sessionOptions)
    this.writeSession = snmp.createSession(host, privateCommunity, sessionOptions)
  }

  get(address: string): Promise<SnmpScalar> {
    const oid = resolveAddress(address)

    return new Promise((resolve, reject) => {
      this.readSession.get([oid], (error, varbinds) => {
        if (error) {
          reject(new SnmpError(address, error.message, { cause: error }))
          return
        }

        const vb = varbinds?.[0]
        if (!vb) {
          reject(new SnmpError(address, 'Empty response'))
          return
        }
        if (snmp.isVarbindError(vb)) {
          reject(new SnmpError(address, snmp.varbindError(vb)))
          return
        }

        try {
          resolve(toScalar(address, vb.value))
        } catch (err) {
          reject(err)
        }
      })
    })
  }

  set(address: string, value: SnmpScalar): Promise<void> {
    const oid = resolveAddress(address)
    const varbind = typeof value === 'number'
      ? { oid, type: snmp.ObjectType.Integer, value }
      : { oid, type: snmp.ObjectType.OctetString, value }

    return new Promise((resolve, reject) => {
      this.writeSession.set([varbind], (error, varbinds) => {
        if (error) {
          reject(new SnmpError(address, error.message, { cause: error }))
          return
        }

        const vb = varbinds?.[0]
        if (vb && snmp.isVarbindError(vb)) {
          reject(new SnmpError(address, snmp.varbindError(vb)))
          return
        }
        resolve()
      })
    })
  }

  close(): void {
    this.readSession.close()
    this.writeSession.close()
  }
}
