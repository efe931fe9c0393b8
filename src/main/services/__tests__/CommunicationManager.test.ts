import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { existsSync, readdirSync, readFileSync } from 'fs'
import { join } from 'path'
import { MediaFileRepo } from '../../db/repositories/MediaFileRepo'
import { mediaFileName } from '../CommunicationManager'
import { createHarness, queueEvaluation, TEXT_ONLY_CONFIG } from './helpers'
import type { Harness } from './helpers'

const PNG = new Uint8Array([0x89, 0x50, 0x4e, 0x47])

describe('CommunicationManager', () => {
  let h: Harness

  beforeEach(() => {
    h = createHarness()
  })

  afterEach(() => {
    vi.restoreAllMocks()
    h.cleanup()
  })

  async function activeSession(enabledModes: Parameters<Harness['sessions']['createSession']>[0]['enabledModes']) {
    const session = await h.sessions.createSession({ ...TEXT_ONLY_CONFIG, enabledModes })
    await h.sessions.startSession(session.id)
    return session
  }

  it('should pad media sequence numbers', () => {
    expect(mediaFileName('snapshot', 7)).toBe('snapshot_007.png')
    expect(mediaFileName('screen', 1234)).toBe('screen_1234.png')
    expect(mediaFileName('audio', 12, 'wav')).toBe('audio_012.wav')
  })

  describe('modes', () => {
    it('should enable and disable configured modes idempotently', async () => {
      const session = await activeSession(['text', 'whiteboard'])

      expect(await h.communication.disableMode(session.id, 'whiteboard')).toEqual(['text'])
      expect(await h.communication.disableMode(session.id, 'whiteboard')).toEqual(['text'])
      expect(await h.communication.enableMode(session.id, 'whiteboard')).toEqual(['text', 'whiteboard'])
      expect(await h.communication.enableMode(session.id, 'whiteboard')).toEqual(['text', 'whiteboard'])
      expect(await h.communication.getActiveModes(session.id)).toEqual(['text', 'whiteboard'])
    })

    it('should reject modes that were not configured', async () => {
      const session = await activeSession(['text'])
      await expect(h.communication.enableMode(session.id, 'video')).rejects.toMatchObject({
        kind: 'configuration',
        code: 'mode-not-enabled',
      })
    })

    it('should freeze modes once the session is completed', async () => {
      const session = await activeSession(['text', 'audio'])
      queueEvaluation(h.generate)
      await h.sessions.endSession(session.id)

      await expect(h.communication.enableMode(session.id, 'audio')).rejects.toMatchObject({ code: 'invalid-status' })
      expect(await h.communication.getActiveModes(session.id)).toEqual([])
    })

    it('should not lose concurrent mode changes', async () => {
      const session = await activeSession(['text', 'audio', 'video', 'whiteboard'])
      await h.communication.disableMode(session.id, 'audio')
      await h.communication.disableMode(session.id, 'video')

      await Promise.all([
        h.communication.enableMode(session.id, 'audio'),
        h.communication.enableMode(session.id, 'video'),
      ])

      expect([...(await h.communication.getActiveModes(session.id))].sort()).toEqual([
        'audio',
        'text',
        'video',
        'whiteboard',
      ])
    })
  })

  describe('saveWhiteboard', () => {
    it('should write snapshots under the session directory', async () => {
      const session = await activeSession(['whiteboard'])

      const path = await h.communication.saveWhiteboard(session.id, PNG)

      expect(path).toBe(`${session.id}/whiteboard/snapshot_001.png`)
      expect(readFileSync(join(h.storageDir, path))).toEqual(Buffer.from(PNG))
      const [media] = await h.communication.getMediaFiles(session.id)
      expect(media).toMatchObject({ kind: 'whiteboard', sequence: 1, sizeBytes: 4, filePath: path })
    })

    it('should assign sequences 1..N under concurrent saves', async () => {
      const session = await activeSession(['whiteboard'])

      const paths = await Promise.all(
        Array.from({ length: 8 }, () => h.communication.saveWhiteboard(session.id, PNG))
      )

      const sequences = (await h.communication.getMediaFiles(session.id, 'whiteboard')).map((m) => m.sequence)
      expect(sequences).toEqual([1, 2, 3, 4, 5, 6, 7, 8])
      expect(new Set(paths).size).toBe(8)
      expect(readdirSync(join(h.storageDir, session.id, 'whiteboard'))).toHaveLength(8)
    })

    it('should retry a transient database failure without duplicate side effects', async () => {
      const session = await activeSession(['whiteboard'])
      await h.communication.saveWhiteboard(session.id, PNG)

      vi.spyOn(MediaFileRepo.prototype, 'create').mockImplementationOnce(() => {
        throw Object.assign(new Error('database is locked'), { code: 'SQLITE_BUSY' })
      })

      const path = await h.communication.saveWhiteboard(session.id, PNG)

      expect(path).toBe(`${session.id}/whiteboard/snapshot_002.png`)
      const media = await h.communication.getMediaFiles(session.id, 'whiteboard')
      expect(media.map((m) => m.sequence)).toEqual([1, 2])
      expect(readdirSync(join(h.storageDir, session.id, 'whiteboard')).sort()).toEqual([
        'snapshot_001.png',
        'snapshot_002.png',
      ])
    })

    it('should remove the file when the row cannot be written', async () => {
      const session = await activeSession(['whiteboard'])
      vi.spyOn(MediaFileRepo.prototype, 'create').mockImplementation(() => {
        throw Object.assign(new Error('disk I/O error'), { code: 'SQLITE_IOERR' })
      })

      await expect(h.communication.saveWhiteboard(session.id, PNG)).rejects.toMatchObject({
        kind: 'data-store',
        code: 'retry-exhausted',
      })
      expect(existsSync(join(h.storageDir, session.id, 'whiteboard', 'snapshot_001.png'))).toBe(false)
    })

    it('should require the whiteboard to be active', async () => {
      const session = await activeSession(['text', 'whiteboard'])
      await h.communication.disableMode(session.id, 'whiteboard')

      await expect(h.communication.saveWhiteboard(session.id, PNG)).rejects.toMatchObject({ code: 'mode-inactive' })
    })

    it('should reject empty captures', async () => {
      const session = await activeSession(['whiteboard'])
      await expect(h.communication.saveWhiteboard(session.id, new Uint8Array())).rejects.toMatchObject({
        code: 'empty-media',
      })
    })
  })

  describe('saveScreenCapture', () => {
    it('should number screen captures separately from snapshots', async () => {
      const session = await activeSession(['whiteboard', 'screen_share'])
      await h.communication.saveWhiteboard(session.id, PNG)

      const path = await h.communication.saveScreenCapture(session.id, PNG)

      expect(path).toBe(`${session.id}/screen/screen_001.png`)
      expect((await h.communication.getMediaFiles(session.id)).map((m) => [m.kind, m.sequence])).toEqual([
        ['screen', 1],
        ['whiteboard', 1],
      ])
    })
  })

  describe('saveAudio / saveVideo', () => {
    it('should store recordings under their own directories with default formats', async () => {
      const session = await activeSession(['audio', 'video'])

      expect(await h.communication.saveAudio(session.id, PNG)).toBe(`${session.id}/audio/audio_001.wav`)
      expect(await h.communication.saveVideo(session.id, PNG)).toBe(`${session.id}/video/video_001.mp4`)
      expect(await h.communication.saveAudio(session.id, PNG, '.MP3')).toBe(`${session.id}/audio/audio_002.mp3`)

      expect((await h.communication.getMediaFiles(session.id)).map((m) => [m.kind, m.sequence])).toEqual([
        ['audio', 1],
        ['audio', 2],
        ['video', 1],
      ])
      expect(readdirSync(join(h.storageDir, session.id, 'audio')).sort()).toEqual(['audio_001.wav', 'audio_002.mp3'])
    })

    it('should require the matching mode to be active', async () => {
      const session = await activeSession(['text', 'audio'])
      await h.communication.disableMode(session.id, 'audio')

      await expect(h.communication.saveAudio(session.id, PNG)).rejects.toMatchObject({ code: 'mode-inactive' })
      await expect(h.communication.saveVideo(session.id, PNG)).rejects.toMatchObject({ code: 'mode-inactive' })
      expect(await h.communication.getMediaFiles(session.id)).toEqual([])
    })

    it('should reject unsupported formats before writing', async () => {
      const session = await activeSession(['audio', 'video'])

      await expect(h.communication.saveAudio(session.id, PNG, 'exe')).rejects.toMatchObject({
        kind: 'configuration',
        code: 'unsupported-format',
      })
      await expect(h.communication.saveVideo(session.id, PNG, 'wav')).rejects.toMatchObject({
        code: 'unsupported-format',
      })
      expect(existsSync(join(h.storageDir, session.id))).toBe(false)
    })

    it('should count recordings in the communication analysis', async () => {
      const session = await activeSession(['audio', 'video'])
      await h.communication.saveAudio(session.id, PNG)
      await h.communication.saveAudio(session.id, PNG)
      await h.communication.saveVideo(session.id, PNG)
      queueEvaluation(h.generate)

      const report = await h.sessions.endSession(session.id)

      expect(report.communicationModeAnalysis).toEqual({
        overallCommunication: 'Explained ideas in order',
        audioQuality: 'Good - 2 audio recordings captured',
        videoPresence: 'Present - 1 video recordings',
      })
    })
  })
})
