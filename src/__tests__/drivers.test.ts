import { describe, expect, it } from 'vitest'
import { ApcPdu, CiscoSwitch, getDriver, isDriverName } from '../index'
import { FakeCatalyst, FakeConnector } from './helpers/fake-catalyst'
import { FakePdu } from './helpers/fake-pdu'

describe('driver registry', () => {
  it('builds a switch by name', async () => {
    const create = getDriver('cisco-ios')
    const sw = create('10.0.0.2', 'netops', 'test-password', { connector: new FakeConnector(new FakeCatalyst()) })

    expect(sw).toBeInstanceOf(CiscoSwitch)
    await sw.connect()
    expect(sw.state).toBe('privileged')
  })

  it('builds a PDU by name', () => {
    const create = getDriver('apc-rpdu2')
    expect(create('10.0.0.9', 'public', 'private', { client: new FakePdu() })).toBeInstanceOf(ApcPdu)
  })

  it('knows only its own drivers', () => {
    expect(isDriverName('cisco-ios')).toBe(true)
    expect(isDriverName('toString')).toBe(false)
    expect(getDriver('zyxel')).toBeUndefined()
  })
})
