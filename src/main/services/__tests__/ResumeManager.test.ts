import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { mkdtempSync, rmSync, writeFileSync } from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'
import type Database from 'better-sqlite3'
import { createTestDatabase } from '../../db/database'
import { DataStore } from '../../db/DataStore'
import { ResumeManager } from '../ResumeManager'
import { ResumeParser } from '../ResumeParser'
import { createFakeClient, reply } from './helpers'

const SELECTION = { provider: 'openai', model: 'gpt-3.5-turbo' }

describe('ResumeManager', () => {
  let db: Database.Database
  let workdir: string
  let filePath: string
  let fake: ReturnType<typeof createFakeClient>
  let manager: ResumeManager

  beforeEach(() => {
    db = createTestDatabase()
    workdir = mkdtempSync(join(tmpdir(), 'resume-manager-'))
    filePath = join(workdir, 'resume.txt')
    writeFileSync(filePath, 'Jane Doe\nStaff engineer, 12 years in payments', 'utf-8')
    fake = createFakeClient()
    manager = new ResumeManager(new DataStore(db, { sleep: async () => {} }), new ResumeParser(), () => fake.client)
  })

  afterEach(() => {
    db.close()
    rmSync(workdir, { recursive: true, force: true })
  })

  it('should extract, validate and store the resume', async () => {
    fake.generate.mockResolvedValueOnce(
      reply(
        'Here is the profile:\n' +
          JSON.stringify({
            name: 'Jane Doe',
            email: null,
            years_of_experience: 12,
            domain_expertise: ['payments'],
            skills: ['Go'],
            recent_role: '',
          })
      )
    )

    const resume = await manager.parseResume(filePath, 'u1', SELECTION)

    expect(resume).toEqual({
      userId: 'u1',
      name: 'Jane Doe',
      yearsOfExperience: 12,
      domainExpertise: ['payments'],
      skills: ['Go'],
      experienceLevel: 'staff',
      rawText: 'Jane Doe\nStaff engineer, 12 years in payments',
    })
    expect(await manager.getResume('u1')).toEqual(resume)
    expect(fake.generate).toHaveBeenCalledWith(
      expect.objectContaining({ model: 'gpt-3.5-turbo', temperature: 0, maxOutputTokens: 1000 })
    )
  })

  it('should fail on output without JSON', async () => {
    fake.generate.mockResolvedValueOnce(reply('I could not read that resume.'))

    await expect(manager.parseResume(filePath, 'u1', SELECTION)).rejects.toMatchObject({
      kind: 'ai-provider',
      code: 'malformed-output',
    })
    expect(await manager.getResume('u1')).toBeNull()
  })

  it('should reject extracted data that does not validate', async () => {
    fake.generate.mockResolvedValueOnce(reply(JSON.stringify({ years_of_experience: 3, domain_expertise: [] })))

    await expect(manager.parseResume(filePath, 'u1', SELECTION)).rejects.toMatchObject({
      kind: 'configuration',
      code: 'invalid-resume',
    })
  })

  it('should wrap client failures as transport errors', async () => {
    fake.generate.mockRejectedValueOnce(new Error('socket hang up'))

    await expect(manager.parseResume(filePath, 'u1', SELECTION)).rejects.toMatchObject({
      kind: 'ai-provider',
      code: 'transport',
      message: 'resume extraction failed: socket hang up',
    })
  })

  it('should require a user id for lookups', async () => {
    await expect(manager.getResume(' ')).rejects.toMatchObject({ code: 'invalid-resume' })
  })
})
