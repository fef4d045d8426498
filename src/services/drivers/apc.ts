import { loadConfig, type NocGearConfig } from '../config'
import { InvalidArgumentError, PduNotLoadedError } from '../errors'
import { pollUntil, type PollOptions } from '../poll'
import { silentLog, type LogFn } from '../types'
import { NetSnmpClient } from './apc-snmp'
import type { SnmpClient, SnmpScalar } from './types'

const PREFIX = 'PowerNet-MIB'

// Static identity
const Q_NAME = 'rPDU2IdentName'
const Q_LOCATION = 'rPDU2IdentLocation'
const Q_HARDWARE_REV = 'rPDU2IdentHardwareRev'
const Q_FIRMWARE_REV = 'rPDU2IdentFirmwareRev'
const Q_MANUFACTURE_DATE = 'rPDU2IdentDateOfManufacture'
const Q_MODEL_NUMBER = 'rPDU2IdentModelNumber'
const Q_SERIAL_NUMBER = 'rPDU2IdentSerialNumber'
const Q_NUM_OUTLETS = 'rPDU2DevicePropertiesNumOutlets'
const Q_NUM_SWITCHED_OUTLETS = 'rPDU2DevicePropertiesNumSwitchedOutlets'
const Q_NUM_METERED_OUTLETS = 'rPDU2DevicePropertiesNumMeteredOutlets'
const Q_MAX_CURRENT_RATING = 'rPDU2DevicePropertiesMaxCurrentRating'
const Q_PHASE_VOLTAGE = 'rPDU2PhaseStatusVoltage'

// Dynamic, read-only
const Q_PHASE_LOAD_STATE = 'rPDU2PhaseStatusLoadState'
const Q_PHASE_CURRENT = 'rPDU2PhaseStatusCurrent'
const Q_POWER = 'rPDU2DeviceStatusPower'
const Q_SENSOR_TYPE = 'rPDU2SensorTempHumidityStatusType'
const Q_SENSOR_NAME = 'rPDU2SensorTempHumidityStatusName'
const Q_SENSOR_COMM_STATUS = 'rPDU2SensorTempHumidityStatusCommStatus'
const Q_SENSOR_TEMP_F = 'rPDU2SensorTempHumidityStatusTempF'
const Q_SENSOR_TEMP_C = 'rPDU2SensorTempHumidityStatusTempC'
const Q_SENSOR_TEMP_STATUS = 'rPDU2SensorTempHumidityStatusTempStatus'
const Q_SENSOR_HUMIDITY = 'rPDU2SensorTempHumidityStatusRelativeHumidity'
const Q_SENSOR_HUMIDITY_STATUS = 'rPDU2SensorTempHumidityStatusHumidityStatus'
const Q_OUTLET_NAME = 'rPDU2OutletSwitchedStatusName'
const Q_OUTLET_STATUS = 'rPDU2OutletSwitchedStatusState'

// Read-write
const Q_SENSOR_NAME_RW = 'rPDU2SensorTempHumidityConfigName'
const Q_OUTLET_NAME_RW = 'rPDU2OutletSwitchedConfigName'
const Q_OUTLET_COMMAND_RW = 'rPDU2OutletSwitchedControlCommand'

// Enumerations, indexed by the integer the agent returns
const LOAD_STATES = ['', 'lowLoad', 'normal', 'nearOverload', 'overload'] as const
const SENSOR_TYPES = ['', 'temperatureOnly', 'temperatureHumidity', 'commsLost', 'notInstalled'] as const
const COMM_STATUS_TYPES = ['', 'notInstalled', 'commsOK', 'commsLost'] as const
const SENSOR_STATUS_TYPES = ['', 'notPresent', 'belowMin', 'belowLow', 'normal', 'aboveHigh', 'aboveMax'] as const
const OUTLET_STATUS_TYPES = ['', 'off', 'on'] as const

export type LoadState = Exclude<(typeof LOAD_STATES)[number], ''> | 'unknown'
export type SensorType = Exclude<(typeof SENSOR_TYPES)[number], ''> | 'unknown'
export type SensorCommStatus = Exclude<(typeof COMM_STATUS_TYPES)[number], ''> | 'unknown'
export type SensorStatus = Exclude<(typeof SENSOR_STATUS_TYPES)[number], ''> | 'unknown'
export type OutletStatus = Exclude<(typeof OUTLET_STATUS_TYPES)[number], ''> | 'unknown'

const OUTLET_OPERATIONS = { on: 1, off: 2, reboot: 3 } as const
export type OutletOperation = keyof typeof OUTLET_OPERATIONS

// States each operation must be seen passing through, in order
const OUTLET_TRANSITIONS: Record<OutletOperation, readonly OutletStatus[]> = {
  on: ['on'],
  off: ['off'],
  reboot: ['off', 'on'],
}

function isOutletOperation(op: string): op is OutletOperation {
  return Object.hasOwn(OUTLET_OPERATIONS, op)
}

function isKnown<T extends string>(value: T | undefined): value is Exclude<T, ''> {
  return value !== undefined && value !== ''
}

function lookup<T extends string>(table: readonly T[], index: number): Exclude<T, ''> | 'unknown' {
  const value = table[index]
  return isKnown(value) ? value : 'unknown'
}

function toInt(value: SnmpScalar): number {
  return typeof value === 'number' ? value : Number.parseInt(value, 10)
}

// "03/15/2016" (mm/dd/yyyy)
function parseManufactureDate(value: string): Date | null {
  const match = value.match(/^(\d{1,2})\/(\d{1,2})\/(\d{4})$/)
  if (!match) return null
  return new Date(Date.UTC(Number(match[3]), Number(match[1]) - 1, Number(match[2])))
}

export interface PduIdentity {
  identification: string
  location: string
  hardwareRevision: string
  firmwareRevision: string
  dateOfManufacture: Date | null
  modelNumber: string
  serialNumber: string
  numOutlets: number
  numSwitchedOutlets: number
  numMeteredOutlets: number
  maxCurrent: number
  voltage: number
}

export interface ApcPduOptions {
  // Defaults to a net-snmp client built from `config`
  client?: SnmpClient
  config?: NocGearConfig
  // Bound for outletCommand's wait on the outlet state
  outletPoll?: PollOptions
  log?: LogFn
}

/**
 * APC rack PDU (rPDU2 agents).
 *
 * Call load() once to read the static identity; outlet operations need it
 * to validate indices. Everything else is a single query per call.
 */
export class ApcPdu {
  readonly host: string
  readonly vendor = 'APC'

  // Temperatures in °C instead of °F
  useCentigrade = false

  private readonly client: SnmpClient
  private readonly outletPoll: PollOptions
  private readonly log: LogFn
  private identity: PduIdentity | null = null

  constructor(host: string, publicCommunity: string, privateCommunity: string, opts: ApcPduOptions = {}) {
    const config = opts.config ?? loadConfig()
    this.host = host
    this.log = opts.log ?? silentLog
    this.outletPoll = opts.outletPoll ?? config.outletPoll
    this.client = opts.client ?? new NetSnmpClient(host, publicCommunity, privateCommunity, {
      timeoutMs: config.snmp.timeoutMs,
      retries: config.snmp.retries,
    })
  }

  private query(symbol: string, index = 1): Promise<SnmpScalar> {
    return this.client.get(`${PREFIX}::${symbol}.${index}`)
  }

  private update(symbol: string, index: number, value: SnmpScalar): Promise<void> {
    return this.client.set(`${PREFIX}::${symbol}.${index}`, value)
  }

  async load(): Promise<PduIdentity> {
    const text = async (symbol: string) => String(await this.query(symbol))
    const int = async (symbol: string) => toInt(await this.query(symbol))

    this.identity = {
      identification: await text(Q_NAME),
      location: await text(Q_LOCATION),
      hardwareRevision: await text(Q_HARDWARE_REV),
      firmwareRevision: await text(Q_FIRMWARE_REV),
      dateOfManufacture: parseManufactureDate(await text(Q_MANUFACTURE_DATE)),
      modelNumber: await text(Q_MODEL_NUMBER),
      serialNumber: await text(Q_SERIAL_NUMBER),
      numOutlets: await int(Q_NUM_OUTLETS),
      numSwitchedOutlets: await int(Q_NUM_SWITCHED_OUTLETS),
      numMeteredOutlets: await int(Q_NUM_METERED_OUTLETS),
      maxCurrent: await int(Q_MAX_CURRENT_RATING),
      voltage: await int(Q_PHASE_VOLTAGE),
    }

    this.log('info', `Loaded ${this.identity.modelNumber} at ${this.host} with ${this.identity.numOutlets} outlets`)
    return this.identity
  }

  close(): void {
    this.client.close()
  }

  private requireIdentity(): PduIdentity {
    if (!this.identity) throw new PduNotLoadedError(this.host)
    return this.identity
  }

  get identification(): string { return this.requireIdentity().identification }
  get location(): string { return this.requireIdentity().location }
  get hardwareRevision(): string { return this.requireIdentity().hardwareRevision }
  get firmwareRevision(): string { return this.requireIdentity().firmwareRevision }
  get dateOfManufacture(): Date | null { return this.requireIdentity().dateOfManufacture }
  get modelNumber(): string { return this.requireIdentity().modelNumber }
  get serialNumber(): string { return this.requireIdentity().serialNumber }
  get numOutlets(): number { return this.requireIdentity().numOutlets }
  get numSwitchedOutlets(): number { return this.requireIdentity().numSwitchedOutlets }
  get numMeteredOutlets(): number { return this.requireIdentity().numMeteredOutlets }
  get maxCurrent(): number { return this.requireIdentity().maxCurrent }
  get voltage(): number { return this.requireIdentity().voltage }

  /* ---------------------------------------------------------------------- */
  /*  Load and power                                                        */
  /* ---------------------------------------------------------------------- */

  async loadState(): Promise<LoadState> {
    return lookup(LOAD_STATES, toInt(await this.query(Q_PHASE_LOAD_STATE)))
  }

  // Amps
  async current(): Promise<number> {
    return toInt(await this.query(Q_PHASE_CURRENT)) / 10
  }

  // Kilowatts
  async power(): Promise<number> {
    return toInt(await this.query(Q_POWER)) / 100
  }

  /* ---------------------------------------------------------------------- */
  /*  Temperature / humidity sensor                                         */
  /* ---------------------------------------------------------------------- */

  // temperatureOnly or temperatureHumidity
  async isSensorPresent(): Promise<boolean> {
    const type = toInt(await this.query(Q_SENSOR_TYPE))
    return type === 1 || type === 2
  }

  async sensorName(): Promise<string | null> {
    if (!(await this.isSensorPresent())) return null
    return String(await this.query(Q_SENSOR_NAME))
  }

  async setSensorName(name: string): Promise<boolean> {
    if (!(await this.isSensorPresent())) return false
    await this.update(Q_SENSOR_NAME_RW, 1, name)
    return true
  }

  async sensorType(): Promise<SensorType> {
    return lookup(SENSOR_TYPES, toInt(await this.query(Q_SENSOR_TYPE)))
  }

  async sensorCommStatus(): Promise<SensorCommStatus> {
    if (!(await this.isSensorPresent())) return 'notInstalled'
    return lookup(COMM_STATUS_TYPES, toInt(await this.query(Q_SENSOR_COMM_STATUS)))
  }

  async sensorSupportsTemperature(): Promise<boolean> {
    return (await this.isSensorPresent()) && (await this.sensorType()).includes('temp')
  }

  async sensorSupportsHumidity(): Promise<boolean> {
    return (await this.isSensorPresent()) && (await this.sensorType()).includes('Humid')
  }

  // Degrees in the unit selected by useCentigrade; 0 without a sensor
  async temperature(): Promise<number> {
    if (!(await this.sensorSupportsTemperature())) return 0
    const symbol = this.useCentigrade ? Q_SENSOR_TEMP_C : Q_SENSOR_TEMP_F
    return toInt(await this.query(symbol)) / 10
  }

  // Relative humidity in percent
  async humidity(): Promise<number | null> {
    if (!(await this.sensorSupportsHumidity())) return null
    return toInt(await this.query(Q_SENSOR_HUMIDITY))
  }

  async temperatureStatus(): Promise<SensorStatus> {
    if (!(await this.sensorSupportsTemperature())) return 'notPresent'
    return lookup(SENSOR_STATUS_TYPES, toInt(await this.query(Q_SENSOR_TEMP_STATUS)))
  }

  async humidityStatus(): Promise<SensorStatus> {
    if (!(await this.sensorSupportsHumidity())) return 'notPresent'
    return lookup(SENSOR_STATUS_TYPES, toInt(await this.query(Q_SENSOR_HUMIDITY_STATUS)))
  }

  /* ---------------------------------------------------------------------- */
  /*  Outlets (1-based)                                                     */
  /* ---------------------------------------------------------------------- */

  private requireOutlet(outlet: number): number {
    const { numOutlets } = this.requireIdentity()
    if (!Number.isInteger(outlet) || outlet < 1 || outlet > numOutlets) {
      throw new InvalidArgumentError(`Outlet ${outlet} out of range 1..${numOutlets}`)
    }
    return outlet
  }

  async getOutletName(outlet: number): Promise<string> {
    return String(await this.query(Q_OUTLET_NAME, this.requireOutlet(outlet)))
  }

  async setOutletName(outlet: number, name: string): Promise<void> {
    await this.update(Q_OUTLET_NAME_RW, this.requireOutlet(outlet), name)
  }

  async outletStatus(outlet: number): Promise<OutletStatus> {
    return lookup(OUTLET_STATUS_TYPES, toInt(await this.query(Q_OUTLET_STATUS, this.requireOutlet(outlet))))
  }

  /**
   * Switch an outlet and wait for it to settle.
   * Resolves true once the outlet has reported every state of the operation
   * in order (a reboot must be seen off, then on), false if that has not
   * happened by the end of the poll budget.
   */
  async outletCommand(outlet: number, operation: string, poll: PollOptions = this.outletPoll): Promise<boolean> {
    if (!isOutletOperation(operation)) {
      throw new InvalidArgumentError(`Unknown outlet operation "${operation}", expected on, off or reboot`)
    }
    const index = this.requireOutlet(outlet)
    const transitions = OUTLET_TRANSITIONS[operation]
    const expected = transitions.join(' then ')

    await this.update(Q_OUTLET_COMMAND_RW, index, OUTLET_OPERATIONS[operation])
    this.log('info', `Outlet ${index} on ${this.host}: ${operation} sent, waiting for ${expected}`)

    let seen = 0
    const settled = await pollUntil(async () => {
      if ((await this.outletStatus(index)) === transitions[seen]) seen++
      return seen === transitions.length
    }, poll)

    if (settled) {
      this.log('success', `Outlet ${index} on ${this.host} went ${expected}`)
    } else {
      this.log('warn', `Outlet ${index} on ${this.host} did not go ${expected} within ${poll.timeoutMs}ms`)
    }
    return settled
  }
}
