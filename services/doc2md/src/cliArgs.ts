import { DEFAULT_ENDPOINT, DEFAULT_MODEL } from './config.js'
import { ConfigError } from './errors.js'

export type ParsedArgs = {
  positionals: string[]
  options: Map<string, string>
  flags: Set<string>
}

export type ArgSpec = {
  options: Record<string, string[]>
  flags: Record<string, string[]>
}

function findName(aliases: Record<string, string[]>, arg: string) {
  for (const [name, names] of Object.entries(aliases)) {
    if (names.includes(arg)) return name
  }
  return null
}

export function parseArgs(argv: string[], spec: ArgSpec): ParsedArgs {
  const positionals: string[] = []
  const options = new Map<string, string>()
  const flags = new Set<string>()

  for (let i = 0; i < argv.length; i += 1) {
    const raw = argv[i]
    if (!raw.startsWith('-') || raw === '-') {
      positionals.push(raw)
      continue
    }

    const eq = raw.startsWith('--') ? raw.indexOf('=') : -1
    const arg = eq > 0 ? raw.slice(0, eq) : raw

    const flag = findName(spec.flags, arg)
    if (flag) {
      flags.add(flag)
      continue
    }

    const option = findName(spec.options, arg)
    if (!option) {
      throw new ConfigError('CONFIG_INVALID', `unknown option ${arg}`)
    }

    const value = eq > 0 ? raw.slice(eq + 1) : argv[i + 1]
    if (value === undefined || (eq < 0 && value.startsWith('-'))) {
      throw new ConfigError('CONFIG_INVALID', `option ${arg} needs a value`)
    }
    options.set(option, value)
    if (eq < 0) i += 1
  }

  return { positionals, options, flags }
}

export const DOC2MD_ARGS: ArgSpec = {
  options: {
    model: ['-m', '--model'],
    endpoint: ['-e', '--endpoint'],
    config: ['-c', '--config'],
    output: ['-o', '--output']
  },
  flags: {
    allowEmpty: ['--allow-empty'],
    help: ['-h', '--help']
  }
}

export const DOC2MD_USAGE = [
  'Usage: doc2md <input_path> [options]',
  '',
  'Extract text from an image (jpg, jpeg, png, gif, bmp, webp) or PDF as Markdown',
  'using an OpenAI-compatible vision model.',
  '',
  'Options:',
  `  -m, --model <name>      model name (default: ${DEFAULT_MODEL})`,
  `  -e, --endpoint <url>    chat-completions endpoint (default: ${DEFAULT_ENDPOINT})`,
  '  -c, --config <file>     TOML config with endpoint, model, api_key (optionally under [llm])',
  '  -o, --output <file>     write Markdown to a file instead of stdout',
  '      --allow-empty       accept pages the model returns no text for',
  '  -h, --help              show this help'
].join('\n')

export type Doc2MdArgs = {
  help: boolean
  inputPath: string
  model: string | null
  endpoint: string | null
  configPath: string | null
  outputPath: string | null
  allowEmptyPages: boolean
}

export function parseCliArgs(argv: string[]): Doc2MdArgs {
  const parsed = parseArgs(argv, DOC2MD_ARGS)
  const help = parsed.flags.has('help')

  if (!help && parsed.positionals.length !== 1) {
    throw new ConfigError(
      'CONFIG_INVALID',
      parsed.positionals.length === 0 ? 'missing <input_path>' : `expected one input path, got ${parsed.positionals.length}`
    )
  }

  return {
    help,
    inputPath: parsed.positionals[0] ?? '',
    model: parsed.options.get('model') ?? null,
    endpoint: parsed.options.get('endpoint') ?? null,
    configPath: parsed.options.get('config') ?? null,
    outputPath: parsed.options.get('output') ?? null,
    allowEmptyPages: parsed.flags.has('allowEmpty')
  }
}
