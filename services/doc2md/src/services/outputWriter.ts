import { writeFile } from 'node:fs/promises'
import type { Writable } from 'node:stream'
import { OutputWriteError } from '../errors.js'

export async function writeMarkdownFile(outputPath: string, markdown: string): Promise<void> {
  try {
    await writeFile(outputPath, markdown, 'utf8')
  } catch (error) {
    throw new OutputWriteError(outputPath, { cause: error })
  }
}

// Write failures reject; the stream's own 'error' event is consumed by the same handler.
function writeToStream(stream: Writable, text: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (error: Error) => reject(new OutputWriteError('<stdout>', { cause: error }))
    stream.once('error', onError)
    stream.write(text, (error) => {
      if (error) {
        onError(error)
        return
      }
      stream.off('error', onError)
      resolve()
    })
  })
}

export async function writeMarkdown(
  markdown: string,
  outputPath: string | null,
  stdout: Writable = process.stdout
): Promise<void> {
  if (!outputPath) {
    await writeToStream(stdout, `${markdown}\n`)
    return
  }

  await writeMarkdownFile(outputPath, markdown)
  console.error(`[doc2md] text extracted and saved to: ${outputPath}`)
}
