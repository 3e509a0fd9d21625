import fs from 'fs/promises'
import os from 'os'
import path from 'path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

import {
  createConfigStore,
  DEFAULT_DRIVER_SETTINGS,
  type DriverSettings,
  loadDriverSettings,
  resolveDriverSettings,
  saveDriverSettings,
  settingsFromEnv,
} from '../src/services/config-store'
import { ValidationError } from '../src/services/frame2ttl-protocol'
import { Frame2TTL } from '../src/services/frame2ttl-session'

describe('config store', () => {
  let tempDir: string

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'frame2ttl-config-'))
  })

  afterEach(async () => {
    vi.unstubAllEnvs()
    await fs.rm(tempDir, { recursive: true, force: true })
  })

  it('should start from the defaults', () => {
    const store = createConfigStore({ cwd: tempDir })

    expect(store.store).toMatchObject(DEFAULT_DRIVER_SETTINGS)
  })

  it('should persist saved settings to disk', async () => {
    const store = createConfigStore({ cwd: tempDir })

    saveDriverSettings(store, { defaultPort: '/dev/ttyACM1', generation: 'v3' })

    const reopened = createConfigStore({ cwd: tempDir })
    expect(reopened.get('defaultPort')).toBe('/dev/ttyACM1')
    expect(reopened.get('generation')).toBe('v3')
    const raw = JSON.parse(await fs.readFile(path.join(tempDir, 'config.json'), 'utf-8'))
    expect(raw.generation).toBe('v3')
  })

  it('should refuse to save invalid settings and keep the old ones', () => {
    const store = createConfigStore({ cwd: tempDir })

    expect(() => saveDriverSettings(store, { handshakeTimeoutMs: -1 })).toThrow(ValidationError)
    expect(store.get('handshakeTimeoutMs')).toBe(1000)
  })

  it('should layer environment and explicit overrides over stored settings', () => {
    const store = createConfigStore({ cwd: tempDir })
    saveDriverSettings(store, { defaultPort: '/dev/ttyACM1', displayBufferSize: 500 })

    const settings = loadDriverSettings(
      store,
      { displayBufferSize: 800 },
      { FRAME2TTL_PORT: '/dev/ttyUSB9', FRAME2TTL_GENERATION: 'v2' }
    )

    expect(settings.defaultPort).toBe('/dev/ttyUSB9')
    expect(settings.generation).toBe('v2')
    expect(settings.displayBufferSize).toBe(800)
  })

  it('should build a session for the stored generation', () => {
    vi.stubEnv('FRAME2TTL_GENERATION', '')
    vi.stubEnv('FRAME2TTL_PORT', '')
    const store = createConfigStore({ cwd: tempDir })
    saveDriverSettings(store, { generation: 'v2', calibrationSettleMs: 2500 })

    const session = Frame2TTL.fromConfig(store)

    expect(session.generation.id).toBe('v2')
    expect(session.settings.calibrationSettleMs).toBe(2500)
  })

  describe('validation', () => {
    it('should reject an unknown generation from the environment', () => {
      expect(() => settingsFromEnv({ FRAME2TTL_GENERATION: 'v9' })).toThrow(ValidationError)
    })

    it('should ignore unset environment variables', () => {
      expect(settingsFromEnv({})).toEqual({})
    })

    it.each([
      ['streamPollIntervalMs', 0],
      ['displayBufferSize', 0],
      ['reconnectDelayMs', 2.5],
      ['maxAcquiredSamples', -1],
    ] as const)('should reject %s = %d', (key, value) => {
      const overrides: Partial<DriverSettings> = {}
      overrides[key] = value

      expect(() => resolveDriverSettings(overrides)).toThrow(`Setting ${key} must be an integer`)
    })

    it('should accept a zero timeout', () => {
      expect(resolveDriverSettings({ calibrationReadTimeoutMs: 0 }).calibrationReadTimeoutMs).toBe(0)
    })
  })
})
