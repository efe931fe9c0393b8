import { readFile } from 'fs/promises'
import { basename, extname } from 'path'
import mammoth from 'mammoth'
import { communicationError, configurationError, toMessage } from '../errors'

export interface ParsedResume {
  filePath: string
  fileName: string
  text: string
}

const TEXT_EXTENSIONS = ['.txt', '.md', '.markdown']

export class ResumeParser {
  async parse(filePath: string): Promise<ParsedResume> {
    const fileName = basename(filePath)
    const ext = extname(filePath).toLowerCase()

    const text = await this.parseByExtension(filePath, ext)
    const normalized = this.normalizeText(text)
    if (!normalized) {
      throw configurationError(`resume file ${fileName} contains no text`, { code: 'empty-resume' })
    }

    return {
      filePath,
      fileName,
      text: normalized,
    }
  }

  private async parseByExtension(filePath: string, ext: string): Promise<string> {
    if (TEXT_EXTENSIONS.includes(ext)) {
      try {
        return await readFile(filePath, 'utf-8')
      } catch (err) {
        throw communicationError(`file storage could not read resume ${basename(filePath)}: ${toMessage(err)}`, {
          code: 'read-failed',
          cause: err,
        })
      }
    }

    if (ext === '.docx') {
      try {
        const result = await mammoth.extractRawText({ path: filePath })
        return result.value
      } catch (err) {
        throw communicationError(`DOCX resume could not be parsed: ${toMessage(err)}`, {
          code: 'read-failed',
          cause: err,
        })
      }
    }

    throw configurationError(`unsupported resume file type: ${ext || 'unknown'}`, { code: 'unsupported-resume' })
  }

  private normalizeText(raw: string): string {
    return raw
      .replace(/\r\n/g, '\n')
      .replace(/\u0000/g, '')
      .replace(/[ \t]+\n/g, '\n')
      .replace(/\n{3,}/g, '\n\n')
      .trim()
  }
}
