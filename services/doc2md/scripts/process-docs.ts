import 'dotenv/config'
import process from 'node:process'
import { parseArgs } from '../src/cliArgs.js'
import { loadConfigFile, resolveModelSettings } from '../src/config.js'
import { describeError } from '../src/errors.js'
import { convertDirectory } from '../src/services/batchConvert.js'

async function run() {
  const args = parseArgs(process.argv.slice(2), {
    options: {
      input: ['-i', '--input'],
      output: ['-o', '--output'],
      config: ['-c', '--config'],
      model: ['-m', '--model'],
      endpoint: ['-e', '--endpoint']
    },
    flags: {
      allowEmpty: ['--allow-empty']
    }
  })

  const inputDir = args.options.get('input') || 'intake'
  const outputDir = args.options.get('output') || 'output'
  const file = await loadConfigFile(args.options.get('config'))

  const config = resolveModelSettings({
    cli: {
      endpoint: args.options.get('endpoint'),
      model: args.options.get('model'),
      allowEmptyPages: args.flags.has('allowEmpty')
    },
    file,
    env: process.env
  })

  const result = await convertDirectory({ inputDir, outputDir, config })
  console.error(`[doc2md-batch] done: ${result.converted.length} file(s) written to ${outputDir}, ${result.failed.length} failed`)
  if (result.failed.length > 0) {
    process.exitCode = 1
  }
}

run().catch((error: unknown) => {
  console.error('[doc2md-batch] failed:', describeError(error))
  process.exit(1)
})
