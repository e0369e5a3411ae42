import { readFile } from "node:fs/promises"
import { z } from "zod"
import { UserInputError } from "./errors.ts"

export const BackoffSchema = z.object({
  baseDelayMs: z.number().int().min(1),
  maxDelayMs: z.number().int().min(1),
  maxAttempts: z.number().int().min(1).max(20),
})

export const ClientConfigSchema = z.object({
  endpoint: z.string().min(1),
  transport: z.enum(["http", "ws"]),
  pollIntervalMs: z.number().int().min(100),
  requestTimeoutMs: z.number().int().min(100),
  retryOnTransportError: z.boolean(),
  retryOnEmptyResult: z.boolean(),
  backoff: BackoffSchema,
  ss58Prefix: z.number().int().min(0).max(16383),
})

export type BackoffConfig = z.infer<typeof BackoffSchema>
export type ClientConfig = z.infer<typeof ClientConfigSchema>

export type ClientConfigInput = Partial<Omit<ClientConfig, "backoff">> & {
  backoff?: Partial<BackoffConfig>
}

const PartialConfigSchema = ClientConfigSchema.partial().extend({
  backoff: BackoffSchema.partial().optional(),
})

export const DEFAULT_BACKOFF: BackoffConfig = {
  baseDelayMs: 1_000,
  maxDelayMs: 8_000,
  maxAttempts: 6,
}

export const DEFAULT_CONFIG: ClientConfig = {
  endpoint: "http://127.0.0.1:9944",
  transport: "http",
  pollIntervalMs: 3_000,
  requestTimeoutMs: 30_000,
  retryOnTransportError: true,
  retryOnEmptyResult: false,
  backoff: DEFAULT_BACKOFF,
  // Avail's registered SS58 format
  ss58Prefix: 42,
}

export function validateConfig(cfg: unknown): string[] {
  const parsed = PartialConfigSchema.safeParse(cfg)
  if (!parsed.success) {
    return parsed.error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
  }

  const errors: string[] = []
  const value = parsed.data

  if (value.backoff?.baseDelayMs !== undefined && value.backoff.maxDelayMs !== undefined) {
    if (value.backoff.maxDelayMs < value.backoff.baseDelayMs) {
      errors.push("backoff.maxDelayMs must be >= backoff.baseDelayMs")
    }
  }

  if (value.endpoint !== undefined) {
    const scheme = endpointScheme(value.endpoint)
    if (scheme === null) {
      errors.push("endpoint must be an http(s):// or ws(s):// URL")
    } else if (value.transport !== undefined && value.transport !== scheme) {
      errors.push(`endpoint scheme does not match transport "${value.transport}"`)
    }
  }

  return errors
}

function endpointScheme(endpoint: string): "http" | "ws" | null {
  if (/^https?:\/\//i.test(endpoint)) return "http"
  if (/^wss?:\/\//i.test(endpoint)) return "ws"
  return null
}

/**
 * Merge user input over the defaults. The transport kind follows the endpoint
 * scheme unless set explicitly.
 */
export function resolveConfig(input: ClientConfigInput = {}): ClientConfig {
  const errors = validateConfig(input)
  if (errors.length > 0) {
    throw new UserInputError(`invalid client config: ${errors.join("; ")}`)
  }

  const endpoint = input.endpoint ?? DEFAULT_CONFIG.endpoint
  const backoff: BackoffConfig = { ...DEFAULT_BACKOFF, ...input.backoff }
  if (backoff.maxDelayMs < backoff.baseDelayMs) {
    throw new UserInputError("invalid client config: backoff.maxDelayMs must be >= backoff.baseDelayMs")
  }

  return {
    endpoint,
    transport: input.transport ?? endpointScheme(endpoint) ?? DEFAULT_CONFIG.transport,
    pollIntervalMs: input.pollIntervalMs ?? DEFAULT_CONFIG.pollIntervalMs,
    requestTimeoutMs: input.requestTimeoutMs ?? DEFAULT_CONFIG.requestTimeoutMs,
    retryOnTransportError: input.retryOnTransportError ?? DEFAULT_CONFIG.retryOnTransportError,
    retryOnEmptyResult: input.retryOnEmptyResult ?? DEFAULT_CONFIG.retryOnEmptyResult,
    backoff,
    ss58Prefix: input.ss58Prefix ?? DEFAULT_CONFIG.ss58Prefix,
  }
}

function envFlag(raw: string | undefined): boolean | undefined {
  if (raw === undefined) return undefined
  return raw === "1" || raw.toLowerCase() === "true"
}

function envNumber(raw: string | undefined): number | undefined {
  return raw !== undefined ? Number(raw) : undefined
}

/**
 * Load config from the JSON file named by TXCLIENT_CONFIG (if any), then apply
 * TXCLIENT_* environment overrides.
 */
export async function loadClientConfig(env: NodeJS.ProcessEnv = process.env): Promise<ClientConfig> {
  let user: ClientConfigInput = {}
  const configPath = env.TXCLIENT_CONFIG
  if (configPath) {
    let raw: string
    try {
      raw = await readFile(configPath, "utf-8")
    } catch (err) {
      throw new UserInputError(`cannot read config file ${configPath}`, { cause: err })
    }
    let json: unknown
    try {
      json = JSON.parse(raw)
    } catch (err) {
      throw new UserInputError(`config file ${configPath} is not valid JSON`, { cause: err })
    }
    const parsed = PartialConfigSchema.safeParse(json)
    if (!parsed.success) {
      throw new UserInputError(`invalid config file ${configPath}: ${validateConfig(json).join("; ")}`)
    }
    user = parsed.data
  }

  const fromEnv: ClientConfigInput = {}
  if (env.TXCLIENT_ENDPOINT) fromEnv.endpoint = env.TXCLIENT_ENDPOINT
  const pollIntervalMs = envNumber(env.TXCLIENT_POLL_INTERVAL_MS)
  if (pollIntervalMs !== undefined) fromEnv.pollIntervalMs = pollIntervalMs
  const requestTimeoutMs = envNumber(env.TXCLIENT_REQUEST_TIMEOUT_MS)
  if (requestTimeoutMs !== undefined) fromEnv.requestTimeoutMs = requestTimeoutMs
  const retry = envFlag(env.TXCLIENT_RETRY_ON_ERROR)
  if (retry !== undefined) fromEnv.retryOnTransportError = retry
  const ss58Prefix = envNumber(env.TXCLIENT_SS58_PREFIX)
  if (ss58Prefix !== undefined) fromEnv.ss58Prefix = ss58Prefix

  // an env endpoint with a different scheme overrides the file's transport kind
  const transport = fromEnv.endpoint !== undefined ? undefined : user.transport
  return resolveConfig({ ...user, ...fromEnv, transport, backoff: user.backoff })
}
