/**
 * Top-level wiring and the local identity
 */

import { test, expect } from '@playwright/test'
import * as fs from 'fs'
import * as path from 'path'
import { createSermonCapture } from '../src/index'
import { USER_ID_ENV, USER_ID_SETTING, createLocalAuthProvider } from '../src/services/localAuthProvider'
import { settingsService } from '../src/services/settingsService'
import {
  FakeMicrophone,
  MemoryStorage,
  ScriptedJobQueue,
  closeDatabase,
  makeTempDir,
  openMemoryDatabase,
  permission,
  removeDir
} from './test-utils'

let dir: string
let savedUserId: string | undefined

test.beforeEach(() => {
  openMemoryDatabase()
  dir = makeTempDir('sermon-capture-')
  savedUserId = process.env[USER_ID_ENV]
  delete process.env[USER_ID_ENV]
})

test.afterEach(() => {
  if (savedUserId === undefined) {
    delete process.env[USER_ID_ENV]
  } else {
    process.env[USER_ID_ENV] = savedUserId
  }
  closeDatabase()
  removeDir(dir)
})

test.describe('createLocalAuthProvider', () => {
  test('reads the user id from the environment first, then settings', () => {
    const provider = createLocalAuthProvider()
    expect(provider.currentUserId()).toBeNull()

    settingsService.set(USER_ID_SETTING, ' pastor-1 ')
    expect(provider.currentUserId()).toBe('pastor-1')

    process.env[USER_ID_ENV] = 'env-user'
    expect(provider.currentUserId()).toBe('env-user')
  })

  test('is signed out without a database', () => {
    closeDatabase()
    expect(createLocalAuthProvider().currentUserId()).toBeNull()
  })
})

test.describe('createSermonCapture', () => {
  test('wires the orchestrator with stored settings and overrides', () => {
    settingsService.set('sermon.minimumRecordingSeconds', 45)
    const jobQueue = new ScriptedJobQueue()

    const capture = createSermonCapture({
      config: { recordingsDir: dir, chunkDurationSeconds: 5 },
      storage: new MemoryStorage(),
      jobQueue,
      microphone: new FakeMicrophone(),
      permission: permission(true)
    })

    expect(capture.config).toMatchObject({ recordingsDir: dir, chunkDurationSeconds: 5, minimumRecordingSeconds: 45 })
    expect(capture.orchestrator.config).toBe(capture.config)
    expect(capture.jobQueue).toBe(jobQueue)
    expect(capture.orchestrator.getState().phase).toEqual({ kind: 'input' })
  })

  test('loads the env file before resolving the user', () => {
    const envFile = path.join(dir, 'capture.env')
    fs.writeFileSync(envFile, `${USER_ID_ENV}=env-file-user\n`)

    createSermonCapture({
      envFile,
      config: { recordingsDir: dir },
      storage: new MemoryStorage(),
      jobQueue: new ScriptedJobQueue(),
      microphone: new FakeMicrophone(),
      permission: permission(true)
    })

    expect(createLocalAuthProvider().currentUserId()).toBe('env-file-user')
  })

  test('requires remote storage and a job queue', () => {
    expect(() => createSermonCapture({ config: { recordingsDir: dir } })).toThrow(
      'Sermon capture needs remote storage: pass `api` or `storage`'
    )
    expect(() => createSermonCapture({ config: { recordingsDir: dir }, storage: new MemoryStorage() })).toThrow(
      'Sermon capture needs a job queue: pass `api`, `processor` or `jobQueue`'
    )
  })

  test('rejects invalid configuration', () => {
    expect(() =>
      createSermonCapture({
        config: { recordingsDir: dir, chunkDurationSeconds: 0 },
        storage: new MemoryStorage(),
        jobQueue: new ScriptedJobQueue()
      })
    ).toThrow('Invalid sermon config: chunkDurationSeconds must be a positive number (got 0)')
  })
})
