import test from 'node:test'
import assert from 'node:assert/strict'
import { parseCliArgs } from './cliArgs.js'
import { ConfigError } from './errors.js'

test('parseCliArgs: positional path with short and long options', () => {
  const args = parseCliArgs(['scan.pdf', '-m', 'llava', '--endpoint=http://gpu-box/v1/chat/completions', '-o', 'out.md', '--allow-empty'])
  assert.deepEqual(args, {
    help: false,
    inputPath: 'scan.pdf',
    model: 'llava',
    endpoint: 'http://gpu-box/v1/chat/completions',
    configPath: null,
    outputPath: 'out.md',
    allowEmptyPages: true
  })
})

test('parseCliArgs: options may come before the input path', () => {
  const args = parseCliArgs(['--config', 'config.toml', 'photo.png'])
  assert.equal(args.configPath, 'config.toml')
  assert.equal(args.inputPath, 'photo.png')
  assert.equal(args.model, null)
})

test('parseCliArgs: help does not need an input path', () => {
  assert.equal(parseCliArgs(['--help']).help, true)
  assert.equal(parseCliArgs(['-h']).help, true)
})

test('parseCliArgs: rejects bad command lines', () => {
  assert.throws(() => parseCliArgs([]), ConfigError)
  assert.throws(() => parseCliArgs(['a.pdf', 'b.pdf']), ConfigError)
  assert.throws(() => parseCliArgs(['a.pdf', '--api-key', 'test-secret']), ConfigError)
  assert.throws(() => parseCliArgs(['a.pdf', '-m']), ConfigError)
  assert.throws(() => parseCliArgs(['a.pdf', '-c', '-o', 'out.md']), ConfigError)
})
