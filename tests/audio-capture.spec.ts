/**
 * Chunked microphone capture against a fake microphone
 */

import { test, expect } from '@playwright/test'
import * as fs from 'fs'
import * as path from 'path'
import { AudioCaptureService, chunkFileName, type ChunkCompletedEvent } from '../src/services/audioCaptureService'
import { AudioLevelHistory } from '../src/services/audioLevelHistory'
import { validateWavFile } from '../src/services/wavUtils'
import { FakeMicrophone, constantPcm, delay, makeTempDir, permission, removeDir } from './test-utils'

let dir: string
let microphone: FakeMicrophone
let capture: AudioCaptureService

test.beforeEach(() => {
  dir = makeTempDir('sermon-capture-')
  microphone = new FakeMicrophone()
  capture = new AudioCaptureService({ recordingsDir: dir, microphone, permission: permission(true) })
})

test.afterEach(async () => {
  await capture.cancel()
  removeDir(dir)
})

test.describe('AudioCaptureService', () => {
  test('chunk file names are zero padded', () => {
    expect(chunkFileName(0)).toBe('chunk_000.wav')
    expect(chunkFileName(12, '.m4a')).toBe('chunk_012.m4a')
  })

  test('splits captured audio into contiguous chunks', async () => {
    const completed: ChunkCompletedEvent[] = []
    capture.on('chunk-completed', event => completed.push(event))

    const handle = await capture.start('sermon-1', { chunkDurationSeconds: 1 })
    expect(capture.getStatus()).toBe('recording')

    microphone.push(constantPcm(2.5))
    await delay(50)

    const paths = await capture.stop()
    expect(paths).toEqual([0, 1, 2].map(index => path.join(dir, 'sermon-1', chunkFileName(index))))
    expect(completed.map(event => event.index)).toEqual([0, 1])
    expect(completed.map(event => event.durationSeconds)).toEqual([1, 1])
    expect(paths.map(file => validateWavFile(file).durationSeconds)).toEqual([1, 1, 0.5])

    expect(capture.getStatus()).toBe('idle')
    expect(microphone.stopped).toBe(true)
    expect(handle.levels.isClosed).toBe(true)
  })

  test('meters one level per 50 ms of audio', async () => {
    const levels = new AudioLevelHistory(100)
    await capture.start('sermon-1', { levels })

    microphone.push(constantPcm(0.5, 8000))
    await delay(50)
    await capture.stop()

    expect(levels.size).toBe(10)
    // (8000 / 32768) squared
    expect(levels.latest).toBeCloseTo(0.0596, 4)
  })

  test('keeps partial frames for the next buffer', async () => {
    await capture.start('sermon-1')

    microphone.push(Buffer.from([1, 0, 2]))
    microphone.push(Buffer.from([0]))
    await delay(50)

    expect(capture.elapsedSeconds).toBe(4 / 32000)
  })

  test('paused audio is dropped', async () => {
    await capture.start('sermon-1')

    capture.pause()
    expect(capture.getStatus()).toBe('paused')
    microphone.push(constantPcm(1))
    await delay(50)

    capture.resume()
    microphone.push(constantPcm(0.5))
    await delay(50)

    expect(capture.elapsedSeconds).toBe(0.5)
  })

  test('stopping below the minimum keeps recording', async () => {
    await capture.start('sermon-1')
    microphone.push(constantPcm(2.5))
    await delay(50)

    await expect(capture.stop(5)).rejects.toMatchObject({
      code: 'RECORDING_TOO_SHORT',
      details: { actualSeconds: 2, minimumSeconds: 5 }
    })
    expect(capture.getStatus()).toBe('recording')

    expect(await capture.stop(2)).toHaveLength(1)
  })

  test('cancel deletes the sermon directory', async () => {
    await capture.start('sermon-1')
    microphone.push(constantPcm(0.5))
    await delay(50)

    await capture.cancel()

    expect(fs.existsSync(path.join(dir, 'sermon-1'))).toBe(false)
    expect(capture.getStatus()).toBe('idle')
    expect(await capture.stop()).toEqual([])
  })

  test('only one capture at a time', async () => {
    await capture.start('sermon-1')
    await expect(capture.start('sermon-2')).rejects.toMatchObject({ code: 'RECORDING_FAILED' })
  })

  test('denied permission does not open the microphone', async () => {
    const denied = new AudioCaptureService({ recordingsDir: dir, microphone, permission: permission(false) })

    await expect(denied.start('sermon-1')).rejects.toMatchObject({ code: 'MICROPHONE_PERMISSION_DENIED' })
    expect(microphone.openCount).toBe(0)
    expect(denied.getStatus()).toBe('idle')
  })

  test('a microphone that fails to open leaves nothing behind', async () => {
    microphone.failOpen = new Error('device busy')

    await expect(capture.start('sermon-1')).rejects.toMatchObject({
      code: 'RECORDING_FAILED',
      message: 'Recording failed: device busy'
    })
    expect(fs.existsSync(path.join(dir, 'sermon-1'))).toBe(false)
    expect(capture.getStatus()).toBe('idle')
  })

  test('an unexpected end of the microphone stream raises an error', async () => {
    const errors: string[] = []
    capture.on('error', error => errors.push(error.code))

    await capture.start('sermon-1')
    microphone.stream?.end()
    await delay(50)

    expect(errors).toEqual(['RECORDING_FAILED'])
    expect(capture.getStatus()).toBe('paused')
  })
})
