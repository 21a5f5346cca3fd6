import 'dotenv/config'
import process from 'node:process'
import { DOC2MD_USAGE, parseCliArgs } from './cliArgs.js'
import { loadConfigFile, resolveConfig } from './config.js'
import { describeError } from './errors.js'
import { writeMarkdown } from './services/outputWriter.js'
import { convertDocument } from './services/visionPipeline.js'

async function main() {
  const args = parseCliArgs(process.argv.slice(2))
  if (args.help) {
    console.log(DOC2MD_USAGE)
    return
  }

  const file = await loadConfigFile(args.configPath)
  const config = resolveConfig({
    cli: {
      inputPath: args.inputPath,
      endpoint: args.endpoint,
      model: args.model,
      outputPath: args.outputPath,
      allowEmptyPages: args.allowEmptyPages
    },
    file,
    env: process.env
  })

  console.error(`[doc2md] ${config.inputPath} -> ${config.model} @ ${config.endpoint}`)
  const result = await convertDocument(config.inputPath, config)
  await writeMarkdown(result.markdown, config.outputPath)
}

main().catch((error: unknown) => {
  console.error('[doc2md] failed:', describeError(error))
  process.exitCode = 1
})
