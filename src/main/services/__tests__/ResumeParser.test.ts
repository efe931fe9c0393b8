import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { mkdtempSync, rmSync, writeFileSync } from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'
import { ResumeParser } from '@main/services/ResumeParser'

describe('ResumeParser', () => {
  let workdir: string
  let parser: ResumeParser

  beforeEach(() => {
    workdir = mkdtempSync(join(tmpdir(), 'resume-parser-'))
    parser = new ResumeParser()
  })

  afterEach(() => {
    rmSync(workdir, { recursive: true, force: true })
  })

  it('should parse plain text resumes and normalize whitespace', async () => {
    const filePath = join(workdir, 'resume.txt')
    writeFileSync(filePath, '  Jane Doe  \r\nBackend Engineer\t\n\n\n\nGo, PostgreSQL, Kafka\n', 'utf-8')

    const result = await parser.parse(filePath)

    expect(result).toEqual({
      filePath,
      fileName: 'resume.txt',
      text: 'Jane Doe\nBackend Engineer\n\nGo, PostgreSQL, Kafka',
    })
  })

  it('should accept markdown resumes', async () => {
    const filePath = join(workdir, 'Resume.MD')
    writeFileSync(filePath, '# Jane Doe\n\n- 8 years in payments', 'utf-8')

    expect((await parser.parse(filePath)).text).toBe('# Jane Doe\n\n- 8 years in payments')
  })

  it('should reject unsupported resume file types', async () => {
    const filePath = join(workdir, 'resume.png')
    writeFileSync(filePath, 'fake-image-content', 'utf-8')

    await expect(parser.parse(filePath)).rejects.toMatchObject({
      kind: 'configuration',
      code: 'unsupported-resume',
      message: 'unsupported resume file type: .png',
    })
  })

  it('should reject files without text', async () => {
    const filePath = join(workdir, 'blank.txt')
    writeFileSync(filePath, ' \n\t\n', 'utf-8')

    await expect(parser.parse(filePath)).rejects.toMatchObject({ code: 'empty-resume' })
  })

  it('should report unreadable files', async () => {
    await expect(parser.parse(join(workdir, 'missing.txt'))).rejects.toMatchObject({
      kind: 'communication',
      code: 'read-failed',
    })
  })
})
