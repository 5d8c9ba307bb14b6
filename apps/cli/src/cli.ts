// ---------------------------------------------------------------------------
// ilds command-line front end
// ---------------------------------------------------------------------------
//
//   ilds vdc --base 3 --scale 8 --count 5
//   ilds halton --base1 2 --base2 5 --seed 100
//   ilds halton-n --dim 4 --scale 12
//   ilds primes --count 30
//
// Sequence output goes through `io.out`, diagnostics through `io.err` and the
// structured logger. `run` never exits the process; it returns the exit code.
// ---------------------------------------------------------------------------

import type { ZodError } from 'zod'
import {
  createHalton,
  createHaltonN,
  createVdCorput,
  haltonConfigSchema,
  haltonNConfigSchema,
  isIldsError,
  nonPrimeBases,
  firstPrimes,
  primesQuerySchema,
  vdcorputConfigSchema,
} from '@ilds-gen/core'
import type { Logger } from './lib/logger'

export interface CliIO {
  out: (line: string) => void
  err: (line: string) => void
  logger: Logger
}

export const EXIT_OK = 0
export const EXIT_FAILURE = 1
export const EXIT_USAGE = 2

const DEFAULT_COUNT = 10
const DEFAULT_PRIME_COUNT = 20
const PRIMES_PER_LINE = 10

export const USAGE = `Usage: ilds <command> [options]

Commands:
  vdc        Integer Van der Corput sequence
             --base, -b <n> (2)  --scale <n> (10)  --count, -c <n> (10)  --seed, -s <n> (0)
  halton     Integer Halton sequence (2-D)
             --base1 <n> (2)  --base2 <n> (3)  --scale1 <n> (11)  --scale2 <n> (7)
             --count, -c <n> (10)  --seed, -s <n> (0)
  halton-n   Integer Halton sequence over the first N primes
             --dim, -d <n> (3)  --scale <n> (10)  --count, -c <n> (10)  --seed, -s <n> (0)
  primes     List the first N primes
             --count, -c <n> (20)

Options:
  --help, -h  Show this message`

type Command = 'vdc' | 'halton' | 'halton-n' | 'primes'

const COMMAND_OPTIONS: Record<Command, readonly string[]> = {
  'vdc': ['base', 'scale', 'count', 'seed'],
  'halton': ['base1', 'base2', 'scale1', 'scale2', 'count', 'seed'],
  'halton-n': ['dim', 'scale', 'count', 'seed'],
  'primes': ['count'],
}

const ALIASES: Record<string, string> = {
  b: 'base',
  c: 'count',
  s: 'seed',
  d: 'dim',
}

function isCommand(value: string): value is Command {
  return Object.keys(COMMAND_OPTIONS).includes(value)
}

/** Bad command line: unknown command/option, missing or non-numeric value. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

// ─── Argument parsing ───────────────────────────────────────────────────────

export type ParsedArgs =
  | { help: true }
  | { help: false; command: Command; options: Map<string, number> }

export function parseArgs(argv: readonly string[]): ParsedArgs {
  if (argv.length === 0 || argv.includes('--help') || argv.includes('-h')) {
    return { help: true }
  }

  const [name, ...rest] = argv
  if (name === undefined || !isCommand(name)) {
    throw new UsageError(`Unknown command: ${name ?? ''}`)
  }

  const allowed = COMMAND_OPTIONS[name]
  const options = new Map<string, number>()

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i] ?? ''
    let key: string
    let raw: string | undefined

    if (arg.startsWith('--')) {
      const eq = arg.indexOf('=')
      key = eq === -1 ? arg.slice(2) : arg.slice(2, eq)
      raw = eq === -1 ? rest[++i] : arg.slice(eq + 1)
    } else if (arg.startsWith('-') && arg.length === 2) {
      key = ALIASES[arg.slice(1)] ?? arg
      raw = rest[++i]
    } else {
      throw new UsageError(`Unexpected argument: ${arg}`)
    }

    if (!allowed.includes(key)) throw new UsageError(`Unknown option for ${name}: ${arg}`)
    if (raw === undefined) throw new UsageError(`Missing value for --${key}`)

    const value = Number(raw)
    if (raw.trim() === '' || Number.isNaN(value)) {
      throw new UsageError(`Expected a number for --${key}, got '${raw}'`)
    }
    options.set(key, value)
  }

  return { help: false, command: name, options }
}

// ─── Formatting ─────────────────────────────────────────────────────────────

function formatFieldErrors(error: ZodError): string {
  const fields = error.flatten().fieldErrors
  return Object.entries(fields)
    .map(([key, messages]) => `${key}: ${(messages ?? []).join(', ')}`)
    .join('; ')
}

const list = (values: readonly number[]): string => `[${values.join(', ')}]`

class ValidationError extends Error {
  constructor(error: ZodError) {
    super(`Invalid options: ${formatFieldErrors(error)}`)
    this.name = 'ValidationError'
  }
}

function warnNonPrime(bases: readonly number[], logger: Logger): void {
  const composite = nonPrimeBases(bases)
  if (composite.length > 0) {
    logger.warn('non_prime_base', {
      bases: composite,
      hint: 'Non-prime bases may reduce sequence uniformity',
    })
  }
}

// ─── Commands ───────────────────────────────────────────────────────────────

function runVdc(options: Map<string, number>, io: CliIO): void {
  const parsed = vdcorputConfigSchema.safeParse({
    base: options.get('base'),
    scale: options.get('scale'),
    seed: options.get('seed'),
    count: options.get('count') ?? DEFAULT_COUNT,
  })
  if (!parsed.success) throw new ValidationError(parsed.error)
  const config = parsed.data

  warnNonPrime([config.base], io.logger)
  const vdc = createVdCorput(config)

  io.out(`Van der Corput sequence (base: ${config.base}, scale: ${config.scale}, seed: ${config.seed}):`)
  for (let i = 1; i <= config.count; i++) {
    io.out(`  ${i}: ${vdc.pop()}`)
  }
}

function runHalton(options: Map<string, number>, io: CliIO): void {
  const parsed = haltonConfigSchema.safeParse({
    bases: [options.get('base1') ?? 2, options.get('base2') ?? 3],
    scales: [options.get('scale1') ?? 11, options.get('scale2') ?? 7],
    seed: options.get('seed'),
    count: options.get('count') ?? DEFAULT_COUNT,
  })
  if (!parsed.success) throw new ValidationError(parsed.error)
  const config = parsed.data

  warnNonPrime(config.bases, io.logger)
  const halton = createHalton(config)

  io.out(`Halton sequence (bases: ${list(config.bases)}, scales: ${list(config.scales)}, seed: ${config.seed}):`)
  for (let i = 1; i <= config.count; i++) {
    io.out(`  ${i}: ${list(halton.pop())}`)
  }
}

function runHaltonN(options: Map<string, number>, io: CliIO): void {
  const parsed = haltonNConfigSchema.safeParse({
    dim: options.get('dim') ?? 3,
    scale: options.get('scale'),
    seed: options.get('seed'),
    count: options.get('count') ?? DEFAULT_COUNT,
  })
  if (!parsed.success) throw new ValidationError(parsed.error)
  const config = parsed.data

  const halton = createHaltonN(config)

  io.out(`HaltonN sequence (bases: ${list(halton.bases)}, scales: ${list(halton.scales)}, seed: ${config.seed}):`)
  for (let i = 1; i <= config.count; i++) {
    io.out(`  ${i}: ${list(halton.pop())}`)
  }
}

function runPrimes(options: Map<string, number>, io: CliIO): void {
  const parsed = primesQuerySchema.safeParse({
    count: options.get('count') ?? DEFAULT_PRIME_COUNT,
  })
  if (!parsed.success) throw new ValidationError(parsed.error)

  const primes = firstPrimes(parsed.data.count)
  io.out(`First ${primes.length} primes:`)
  for (let i = 0; i < primes.length; i += PRIMES_PER_LINE) {
    io.out(primes.slice(i, i + PRIMES_PER_LINE).join(' '))
  }
}

const HANDLERS: Record<Command, (options: Map<string, number>, io: CliIO) => void> = {
  'vdc': runVdc,
  'halton': runHalton,
  'halton-n': runHaltonN,
  'primes': runPrimes,
}

// ─── Entry ──────────────────────────────────────────────────────────────────

/**
 * Run one CLI invocation and return its exit code.
 * Errors other than usage, validation and generator failures propagate.
 */
export function run(argv: readonly string[], io: CliIO): number {
  let args: ParsedArgs
  try {
    args = parseArgs(argv)
  } catch (err) {
    if (!(err instanceof UsageError)) throw err
    io.err(`error: ${err.message}`)
    io.err(USAGE)
    return EXIT_USAGE
  }

  if (args.help) {
    io.out(USAGE)
    return EXIT_OK
  }

  io.logger.debug('command_start', { command: args.command, options: Object.fromEntries(args.options) })

  try {
    HANDLERS[args.command](args.options, io)
  } catch (err) {
    if (err instanceof ValidationError || isIldsError(err)) {
      io.logger.debug('command_failed', {
        command: args.command,
        code: isIldsError(err) ? err.code : 'VALIDATION',
        error: err.message,
      })
      io.err(`error: ${err.message}`)
      return EXIT_FAILURE
    }
    throw err
  }

  return EXIT_OK
}
