import { beforeEach, describe, expect, it, vi } from 'vitest'
import { ApcPdu } from '../services/drivers/apc'
import { resolveAddress } from '../services/drivers/apc-snmp'
import { InvalidArgumentError, PduNotLoadedError, SnmpError } from '../services/errors'
import { FakePdu } from './helpers/fake-pdu'

const fastPoll = { timeoutMs: 50, intervalMs: 5 }

describe('resolveAddress', () => {
  it('maps symbolic names to numeric OIDs', () => {
    expect(resolveAddress('PowerNet-MIB::rPDU2OutletSwitchedStatusState.3')).toBe('1.3.6.1.4.1.318.1.1.26.9.2.3.1.5.3')
    expect(resolveAddress('rPDU2IdentName.1')).toBe('1.3.6.1.4.1.318.1.1.26.2.1.3.1')
  })

  it('rejects unknown modules, symbols and malformed addresses', () => {
    expect(() => resolveAddress('IF-MIB::ifDescr.1')).toThrow(SnmpError)
    expect(() => resolveAddress('PowerNet-MIB::rPDU2Nothing.1')).toThrow('Unknown symbol rPDU2Nothing')
    expect(() => resolveAddress('rPDU2IdentName')).toThrow('Malformed address')
  })
})

describe('ApcPdu identity', () => {
  it('refuses identity reads before load', () => {
    const pdu = new ApcPdu('10.0.0.9', 'public', 'private', { client: new FakePdu() })

    expect(() => pdu.numOutlets).toThrow(PduNotLoadedError)
    expect(() => pdu.modelNumber).toThrow('10.0.0.9: PDU identity not loaded, call load() first')
  })

  it('loads the static identity', async () => {
    const log = vi.fn()
    const pdu = new ApcPdu('10.0.0.9', 'public', 'private', { client: new FakePdu(), log })
    await pdu.load()

    expect(pdu.vendor).toBe('APC')
    expect(pdu.identification).toBe('pdu-rack-a1')
    expect(pdu.location).toBe('Lab rack A1')
    expect(pdu.hardwareRevision).toBe('05')
    expect(pdu.firmwareRevision).toBe('6.4.0')
    expect(pdu.dateOfManufacture?.toISOString()).toBe('2016-03-15T00:00:00.000Z')
    expect(pdu.modelNumber).toBe('AP8941')
    expect(pdu.serialNumber).toBe('TEST0000001')
    expect(pdu.numOutlets).toBe(8)
    expect(pdu.numSwitchedOutlets).toBe(8)
    expect(pdu.numMeteredOutlets).toBe(8)
    expect(pdu.maxCurrent).toBe(16)
    expect(pdu.voltage).toBe(230)
    expect(log).toHaveBeenCalledWith('info', 'Loaded AP8941 at 10.0.0.9 with 8 outlets')
  })

  it('leaves an unreadable manufacture date empty', async () => {
    const agent = new FakePdu()
    agent.setScalar('rPDU2IdentDateOfManufacture', 'unknown')
    const pdu = new ApcPdu('10.0.0.9', 'public', 'private', { client: agent })
    await pdu.load()

    expect(pdu.dateOfManufacture).toBeNull()
  })

  it('closes the SNMP client', () => {
    const agent = new FakePdu()
    new ApcPdu('10.0.0.9', 'public', 'private', { client: agent }).close()
    expect(agent.closed).toBe(true)
  })
})

describe('ApcPdu readings', () => {
  let agent: FakePdu
  let pdu: ApcPdu

  beforeEach(() => {
    agent = new FakePdu()
    pdu = new ApcPdu('10.0.0.9', 'public', 'private', { client: agent })
  })

  it('scales load readings', async () => {
    expect(await pdu.loadState()).toBe('normal')
    expect(await pdu.current()).toBe(3.7)
    expect(await pdu.power()).toBe(0.85)
  })

  it('maps unexpected enumeration values to unknown', async () => {
    agent.setScalar('rPDU2PhaseStatusLoadState', 9)
    expect(await pdu.loadState()).toBe('unknown')
  })

  it('reads a temperature and humidity sensor', async () => {
    expect(await pdu.isSensorPresent()).toBe(true)
    expect(await pdu.sensorType()).toBe('temperatureHumidity')
    expect(await pdu.sensorName()).toBe('Rack inlet')
    expect(await pdu.sensorCommStatus()).toBe('commsOK')
    expect(await pdu.sensorSupportsTemperature()).toBe(true)
    expect(await pdu.sensorSupportsHumidity()).toBe(true)
    expect(await pdu.temperature()).toBe(77.4)
    expect(await pdu.humidity()).toBe(41)
    expect(await pdu.temperatureStatus()).toBe('normal')
    expect(await pdu.humidityStatus()).toBe('aboveHigh')
  })

  it('switches to centigrade', async () => {
    pdu.useCentigrade = true
    expect(await pdu.temperature()).toBe(25.4)
    expect(agent.gets).toContain('PowerNet-MIB::rPDU2SensorTempHumidityStatusTempC.1')
  })

  it('renames the sensor', async () => {
    expect(await pdu.setSensorName('Rack exhaust')).toBe(true)
    expect(agent.sets).toEqual([['PowerNet-MIB::rPDU2SensorTempHumidityConfigName.1', 'Rack exhaust']])
    expect(await pdu.sensorName()).toBe('Rack exhaust')
  })

  it('has no humidity on a temperature-only probe', async () => {
    agent.setScalar('rPDU2SensorTempHumidityStatusType', 1)

    expect(await pdu.sensorSupportsTemperature()).toBe(true)
    expect(await pdu.sensorSupportsHumidity()).toBe(false)
    expect(await pdu.humidity()).toBeNull()
    expect(await pdu.humidityStatus()).toBe('notPresent')
  })

  it('answers with defaults when no sensor is installed', async () => {
    agent.setScalar('rPDU2SensorTempHumidityStatusType', 4)

    expect(await pdu.isSensorPresent()).toBe(false)
    expect(await pdu.sensorType()).toBe('notInstalled')
    expect(await pdu.sensorName()).toBeNull()
    expect(await pdu.sensorCommStatus()).toBe('notInstalled')
    expect(await pdu.temperature()).toBe(0)
    expect(await pdu.humidity()).toBeNull()
    expect(await pdu.temperatureStatus()).toBe('notPresent')
    expect(await pdu.setSensorName('Rack exhaust')).toBe(false)
    expect(agent.sets).toEqual([])
  })
})

describe('ApcPdu outlets', () => {
  let agent: FakePdu
  let pdu: ApcPdu
  let log: ReturnType<typeof vi.fn>

  beforeEach(async () => {
    agent = new FakePdu(8)
    log = vi.fn()
    pdu = new ApcPdu('10.0.0.9', 'public', 'private', { client: agent, log, outletPoll: fastPoll })
    await pdu.load()
  })

  it('reads and renames outlets', async () => {
    expect(await pdu.getOutletName(2)).toBe('Outlet 2')
    await pdu.setOutletName(2, 'Core switch')
    expect(agent.sets).toEqual([['PowerNet-MIB::rPDU2OutletSwitchedConfigName.2', 'Core switch']])
    expect(await pdu.getOutletName(2)).toBe('Core switch')
    expect(await pdu.outletStatus(2)).toBe('on')
  })

  it('switches an outlet off and waits for it', async () => {
    expect(await pdu.outletCommand(3, 'off')).toBe(true)
    expect(agent.sets).toEqual([['PowerNet-MIB::rPDU2OutletSwitchedControlCommand.3', 2]])
    expect(await pdu.outletStatus(3)).toBe('off')
    expect(log).toHaveBeenCalledWith('success', 'Outlet 3 on 10.0.0.9 went off')
  })

  it('waits for a rebooted outlet to go off and come back on', async () => {
    expect(await pdu.outletCommand(1, 'reboot')).toBe(true)
    expect(agent.sets).toEqual([['PowerNet-MIB::rPDU2OutletSwitchedControlCommand.1', 3]])
    expect(agent.gets.filter(address => address === 'PowerNet-MIB::rPDU2OutletSwitchedStatusState.1')).toHaveLength(2)
    expect(log).toHaveBeenCalledWith('success', 'Outlet 1 on 10.0.0.9 went off then on')
  })

  it('does not confirm a reboot the outlet never went through', async () => {
    agent.stuck = true
    expect(await pdu.outletCommand(1, 'reboot', { timeoutMs: 30, intervalMs: 5 })).toBe(false)
    expect(await pdu.outletStatus(1)).toBe('on')
    expect(log).toHaveBeenCalledWith('warn', 'Outlet 1 on 10.0.0.9 did not go off then on within 30ms')
  })

  it('returns false when the outlet never reaches the target state', async () => {
    agent.stuck = true
    expect(await pdu.outletCommand(3, 'off', { timeoutMs: 30, intervalMs: 5 })).toBe(false)
    expect(log).toHaveBeenCalledWith('warn', 'Outlet 3 on 10.0.0.9 did not go off within 30ms')
  })

  it('validates the outlet before any SNMP traffic', async () => {
    const before = agent.gets.length

    await expect(pdu.outletCommand(0, 'on')).rejects.toBeInstanceOf(InvalidArgumentError)
    await expect(pdu.outletCommand(9, 'on')).rejects.toThrow('Outlet 9 out of range 1..8')
    await expect(pdu.outletCommand(1.5, 'on')).rejects.toBeInstanceOf(InvalidArgumentError)
    await expect(pdu.getOutletName(9)).rejects.toBeInstanceOf(InvalidArgumentError)
    await expect(pdu.outletStatus(0)).rejects.toThrow('Outlet 0 out of range 1..8')
    await expect(pdu.outletStatus(9)).rejects.toThrow('Outlet 9 out of range 1..8')
    expect(agent.sets).toEqual([])
    expect(agent.gets).toHaveLength(before)
  })

  it('rejects unknown operations', async () => {
    await expect(pdu.outletCommand(1, 'cycle')).rejects.toThrow('Unknown outlet operation "cycle", expected on, off or reboot')
    expect(agent.sets).toEqual([])
  })

  it('needs load() before outlet operations', async () => {
    const fresh = new ApcPdu('10.0.0.9', 'public', 'private', { client: new FakePdu() })
    await expect(fresh.outletCommand(1, 'on')).rejects.toBeInstanceOf(PduNotLoadedError)
  })
})
