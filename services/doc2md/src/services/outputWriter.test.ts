import test from 'node:test'
import assert from 'node:assert/strict'
import { mkdtemp, readFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import path from 'node:path'
import { PassThrough, Writable } from 'node:stream'
import { OutputWriteError } from '../errors.js'
import { writeMarkdown, writeMarkdownFile } from './outputWriter.js'

test('writeMarkdown: prints to the given stream with a trailing newline', async () => {
  const stdout = new PassThrough()
  const chunks: string[] = []
  stdout.on('data', (chunk: Buffer) => chunks.push(chunk.toString('utf8')))

  await writeMarkdown('# Title\n\nBody', null, stdout)
  assert.equal(chunks.join(''), '# Title\n\nBody\n')
})

test('writeMarkdownFile: writes the text verbatim', async () => {
  const dir = await mkdtemp(path.join(tmpdir(), 'doc2md-output-'))
  const file = path.join(dir, 'out.md')

  await writeMarkdownFile(file, '# Titel\n\nÜber  \n')
  assert.equal(await readFile(file, 'utf8'), '# Titel\n\nÜber  \n')
})

test('writeMarkdownFile: unwritable path is an OutputWriteError', async () => {
  const dir = await mkdtemp(path.join(tmpdir(), 'doc2md-output-'))
  const file = path.join(dir, 'missing', 'out.md')

  await assert.rejects(writeMarkdownFile(file, 'text'), (error: unknown) => {
    assert.ok(error instanceof OutputWriteError)
    assert.equal(error.code, 'OUTPUT_WRITE_FAILED')
    return true
  })
})

test('writeMarkdown: a failing stdout write is an OutputWriteError', async () => {
  const stdout = new Writable({
    write(_chunk, _encoding, callback) {
      callback(Object.assign(new Error('write EPIPE'), { code: 'EPIPE' }))
    }
  })

  await assert.rejects(writeMarkdown('# Title', null, stdout), (error: unknown) => {
    assert.ok(error instanceof OutputWriteError)
    assert.equal(error.message, 'OUTPUT_WRITE_FAILED: <stdout>: write EPIPE')
    assert.ok(error.cause instanceof Error && 'code' in error.cause)
    assert.equal(error.cause.code, 'EPIPE')
    return true
  })
})
