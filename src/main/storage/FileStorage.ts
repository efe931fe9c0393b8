import { mkdirSync, readFileSync, rmSync, unlinkSync, writeFileSync } from 'fs'
import { dirname, isAbsolute, join, normalize, sep } from 'path'
import { communicationError, isPlatformError, toMessage } from '../errors'
import { getLogger } from '../logger'

const log = getLogger('FileStorage')

export interface StoredFile {
  /** 相对存储根目录 */
  filePath: string
  sizeBytes: number
}

/**
 * 会话媒体存储：<rootDir>/<sessionId>/<kind>/<file>，文件只写一次。
 * 写入是同步的，以便与数据库事务放在同一临界区内。
 */
export class FileStorage {
  constructor(private rootDir: string) {}

  getRootDir(): string {
    return this.rootDir
  }

  resolve(relativePath: string): string {
    const normalized = normalize(relativePath)
    if (isAbsolute(normalized) || normalized === '..' || normalized.startsWith(`..${sep}`)) {
      throw communicationError(`file storage path escapes the storage root: ${relativePath}`, { code: 'invalid-path' })
    }
    return join(this.rootDir, normalized)
  }

  writeOnce(relativePath: string, data: Uint8Array): StoredFile {
    const absolute = this.resolve(relativePath)
    try {
      mkdirSync(dirname(absolute), { recursive: true })
      writeFileSync(absolute, data, { flag: 'wx' })
    } catch (err) {
      throw communicationError(`file storage write failed for ${relativePath}: ${toMessage(err)}`, {
        code: hasCode(err, 'EEXIST') ? 'already-exists' : 'write-failed',
        cause: err,
      })
    }
    return { filePath: relativePath, sizeBytes: data.byteLength }
  }

  read(relativePath: string): Buffer {
    try {
      return readFileSync(this.resolve(relativePath))
    } catch (err) {
      if (isPlatformError(err)) throw err
      throw communicationError(`file storage read failed for ${relativePath}: ${toMessage(err)}`, {
        code: 'read-failed',
        cause: err,
      })
    }
  }

  /** 回滚写入时删除文件，失败只记录日志 */
  discard(relativePath: string): void {
    try {
      unlinkSync(this.resolve(relativePath))
    } catch (err) {
      log.warn('删除媒体文件失败', { filePath: relativePath, error: toMessage(err) })
    }
  }

  removeSession(sessionId: string): void {
    try {
      rmSync(this.resolve(sessionId), { recursive: true, force: true })
    } catch (err) {
      throw communicationError(`file storage cleanup failed for session ${sessionId}: ${toMessage(err)}`, { cause: err })
    }
  }
}

function hasCode(err: unknown, code: string): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === code
}
