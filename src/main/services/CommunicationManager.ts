import type { CommunicationMode, MediaFile, MediaKind, Session } from '@shared/types/session'
import type { DataStore } from '../db/DataStore'
import { turnRejectedError } from '../db/DataStore'
import type { FileStorage } from '../storage/FileStorage'
import { configurationError } from '../errors'
import { getLogger } from '../logger'

const log = getLogger('CommunicationManager')

interface MediaLayout {
  dir: string
  prefix: string
  mode: CommunicationMode
  /** 允许的扩展名，第一个为默认值 */
  formats: readonly string[]
}

/** 媒体文件的存放目录、文件名前缀与所需模式 */
const MEDIA_LAYOUT: Record<MediaKind, MediaLayout> = {
  whiteboard: { dir: 'whiteboard', prefix: 'snapshot', mode: 'whiteboard', formats: ['png'] },
  screen: { dir: 'screen', prefix: 'screen', mode: 'screen_share', formats: ['png'] },
  audio: { dir: 'audio', prefix: 'audio', mode: 'audio', formats: ['wav', 'mp3', 'ogg', 'webm', 'm4a'] },
  video: { dir: 'video', prefix: 'video', mode: 'video', formats: ['mp4', 'webm', 'mov'] },
}

export function mediaFileName(prefix: string, sequence: number, ext: string = 'png'): string {
  return `${prefix}_${String(sequence).padStart(3, '0')}.${ext}`
}

/**
 * 沟通模式与媒体管理。
 * 活跃模式集合保存在 sessions 表中；媒体序号在数据库事务内分配。
 */
export class CommunicationManager {
  constructor(
    private dataStore: DataStore,
    private storage: FileStorage
  ) {}

  async enableMode(sessionId: string, mode: CommunicationMode): Promise<CommunicationMode[]> {
    await this.requireConfiguredMode(sessionId, mode)
    const modes = await this.persistModes(sessionId, (current) =>
      current.includes(mode) ? current : [...current, mode]
    )
    log.info('启用沟通模式', { sessionId, mode })
    return modes
  }

  async disableMode(sessionId: string, mode: CommunicationMode): Promise<CommunicationMode[]> {
    await this.requireConfiguredMode(sessionId, mode)
    const modes = await this.persistModes(sessionId, (current) => current.filter((m) => m !== mode))
    log.info('停用沟通模式', { sessionId, mode })
    return modes
  }

  async getActiveModes(sessionId: string): Promise<CommunicationMode[]> {
    const session = await this.requireSession(sessionId)
    return session.activeModes
  }

  /** 保存白板快照，返回相对存储根目录的路径 */
  async saveWhiteboard(sessionId: string, blob: Uint8Array): Promise<string> {
    const media = await this.saveMedia(sessionId, 'whiteboard', blob)
    return media.filePath
  }

  /** 保存屏幕共享截图，返回相对存储根目录的路径 */
  async saveScreenCapture(sessionId: string, blob: Uint8Array): Promise<string> {
    const media = await this.saveMedia(sessionId, 'screen', blob)
    return media.filePath
  }

  /** 保存录音（默认 wav），返回相对存储根目录的路径 */
  async saveAudio(sessionId: string, blob: Uint8Array, format: string = 'wav'): Promise<string> {
    const media = await this.saveMedia(sessionId, 'audio', blob, format)
    return media.filePath
  }

  /** 保存录像（默认 mp4），返回相对存储根目录的路径 */
  async saveVideo(sessionId: string, blob: Uint8Array, format: string = 'mp4'): Promise<string> {
    const media = await this.saveMedia(sessionId, 'video', blob, format)
    return media.filePath
  }

  async getMediaFiles(sessionId: string, kind?: MediaKind): Promise<MediaFile[]> {
    return this.dataStore.getMediaFiles(sessionId, kind)
  }

  private async saveMedia(sessionId: string, kind: MediaKind, blob: Uint8Array, format?: string): Promise<MediaFile> {
    const layout = MEDIA_LAYOUT[kind]
    const ext = (format ?? layout.formats[0] ?? '').trim().replace(/^\./, '').toLowerCase()
    if (!layout.formats.includes(ext)) {
      throw configurationError(`${kind} format ${format} is not supported (expected ${layout.formats.join(', ')})`, {
        code: 'unsupported-format',
      })
    }
    const session = await this.requireSession(sessionId)
    if (session.endedAt !== null && session.status !== 'completed') {
      throw turnRejectedError(sessionId, 'session-ending')
    }
    if (!session.activeModes.includes(layout.mode)) {
      throw configurationError(`${layout.mode} mode is not active for session ${sessionId}`, { code: 'mode-inactive' })
    }
    if (blob.byteLength === 0) {
      throw configurationError(`${kind} capture is empty`, { code: 'empty-media' })
    }

    const media = await this.dataStore.appendMediaFile(sessionId, kind, {
      write: (sequence) =>
        this.storage.writeOnce(`${sessionId}/${layout.dir}/${mediaFileName(layout.prefix, sequence, ext)}`, blob),
      discard: (filePath) => this.storage.discard(filePath),
    })

    log.info('保存媒体文件', { sessionId, kind, sequence: media.sequence })
    return media
  }

  private async persistModes(
    sessionId: string,
    update: (current: CommunicationMode[]) => CommunicationMode[]
  ): Promise<CommunicationMode[]> {
    const modes = await this.dataStore.updateActiveModes(sessionId, update)
    if (!modes) {
      throw configurationError(`session ${sessionId} is completed or ending; communication modes are frozen`, {
        code: 'invalid-status',
      })
    }
    return modes
  }

  private async requireConfiguredMode(sessionId: string, mode: CommunicationMode): Promise<Session> {
    const session = await this.requireSession(sessionId)
    if (!session.config.enabledModes.includes(mode)) {
      throw configurationError(`mode ${mode} is not enabled for session ${sessionId}`, { code: 'mode-not-enabled' })
    }
    if (session.status === 'completed') {
      throw configurationError(`session ${sessionId} is completed; communication modes are frozen`, {
        code: 'invalid-status',
      })
    }
    if (session.endedAt !== null) {
      throw turnRejectedError(sessionId, 'session-ending')
    }
    return session
  }

  private async requireSession(sessionId: string): Promise<Session> {
    const session = await this.dataStore.getSession(sessionId)
    if (!session) {
      throw configurationError(`session not found: ${sessionId}`, { code: 'session-not-found' })
    }
    return session
  }
}
