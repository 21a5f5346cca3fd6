import { mkdir, readdir } from 'node:fs/promises'
import path from 'node:path'
import { describeError, InputError, OutputWriteError } from '../errors.js'
import { writeMarkdownFile } from './outputWriter.js'
import { convertDocument, type VisionPipelineConfig, type VisionPipelineDeps } from './visionPipeline.js'

export type BatchConversion = {
  input: string
  output: string
}

export type BatchFailure = {
  input: string
  error: unknown
}

export type BatchResult = {
  converted: BatchConversion[]
  failed: BatchFailure[]
}

export async function listPdfFiles(inputDir: string): Promise<string[]> {
  const entries = await readdir(inputDir, { withFileTypes: true }).catch((error: unknown) => {
    throw new InputError('INPUT_NOT_FOUND', `cannot read directory ${inputDir}`, { cause: error })
  })

  return entries
    .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith('.pdf'))
    .map((entry) => entry.name)
    .sort()
}

export async function convertDirectory(params: {
  inputDir: string
  outputDir: string
  config: VisionPipelineConfig
  deps?: VisionPipelineDeps
}): Promise<BatchResult> {
  const log = params.deps?.log ?? ((line: string) => console.error(line))
  const names = await listPdfFiles(params.inputDir)
  if (names.length === 0) {
    throw new InputError('NO_PDF_FILES', `no PDF files found in ${params.inputDir}`)
  }

  try {
    await mkdir(params.outputDir, { recursive: true })
  } catch (error) {
    throw new OutputWriteError(params.outputDir, { cause: error })
  }

  // Files are independent: a failing document is reported and the rest still run.
  const result: BatchResult = { converted: [], failed: [] }
  for (const name of names) {
    const input = path.join(params.inputDir, name)
    const output = path.join(params.outputDir, `${path.basename(name, path.extname(name))}.md`)

    try {
      const document = await convertDocument(input, params.config, params.deps)
      await writeMarkdownFile(output, document.markdown)
    } catch (error) {
      result.failed.push({ input, error })
      log(`[doc2md-batch] failed ${input}: ${describeError(error)}`)
      continue
    }
    result.converted.push({ input, output })
    log(`[doc2md-batch] converted ${input} -> ${output}`)
  }

  return result
}
