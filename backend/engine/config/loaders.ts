// engine/config/loaders.ts
// Layered config: defaults -> JSON file -> environment (.env via dotenv) ->
// explicit overrides. Later layers win.

import fs from "fs"
import dotenv from "dotenv"

import { getDefaults, type BasisConfig, type PairCfg } from "./defaults"
import {
  err,
  isObject,
  isString,
  makeError,
  ok,
  resultifySync,
  toBoolean,
  toFiniteNumber,
  type Result,
} from "../errors"
import { childLogger } from "../../observability/logger"

const log = childLogger("config")

export const CONFIG_SEARCH_PATHS = ["config/config.json", "config.json"]

type NumericKey =
  | "accountSize"
  | "fundingCostAnnual"
  | "entryThreshold"
  | "stopLossThreshold"
  | "exitThreshold"
  | "strongEntryThreshold"
  | "holdingDays"
  | "cmeContractSize"

/** Top-level snake_case keys of the config file. */
const FILE_NUMBERS: Record<string, NumericKey> = {
  account_size: "accountSize",
  funding_cost_annual: "fundingCostAnnual",
  cme_contract_size: "cmeContractSize",
  entry_threshold: "entryThreshold",
  stop_loss_threshold: "stopLossThreshold",
  exit_threshold: "exitThreshold",
  strong_entry_threshold: "strongEntryThreshold",
  holding_days: "holdingDays",
}

/** Keys under `alert_thresholds`; the top-level names above take precedence. */
const ALERT_NUMBERS: Record<string, NumericKey> = {
  min_entry_basis: "entryThreshold",
  stop_loss_basis: "stopLossThreshold",
  full_exit_basis: "exitThreshold",
  strong_entry_basis: "strongEntryThreshold",
}

export const ENV_NUMBERS: Record<string, NumericKey> = {
  BASIS_ACCOUNT_SIZE: "accountSize",
  BASIS_FUNDING_COST_ANNUAL: "fundingCostAnnual",
  BASIS_ENTRY_THRESHOLD: "entryThreshold",
  BASIS_STOP_LOSS_THRESHOLD: "stopLossThreshold",
  BASIS_EXIT_THRESHOLD: "exitThreshold",
  BASIS_HOLDING_DAYS: "holdingDays",
}

export type LoadConfigOptions = {
  /** JSON config path; when omitted the search paths are tried. */
  file?: string
  /** Environment to read; defaults to process.env after loading .env. */
  env?: NodeJS.ProcessEnv
  overrides?: Partial<BasisConfig>
}

/* ---------------- value parsing ---------------- */

function readNumbers(
  src: Record<string, unknown>,
  keys: Record<string, NumericKey>,
  into: Partial<BasisConfig>,
  origin: string
): void {
  for (const [raw, key] of Object.entries(keys)) {
    const v = src[raw]
    if (v === undefined || v === null) continue
    const n = toFiniteNumber(v)
    if (n === undefined) {
      log.warn(`ignoring non-numeric ${raw} in ${origin}`, { value: v })
      continue
    }
    into[key] = n
  }
}

function parsePair(v: unknown): PairCfg | undefined {
  if (!isObject(v) || !isObject(v.spot) || !isObject(v.futures)) return undefined
  const { spot, futures } = v
  if (!isString(spot.symbol) || !isString(futures.symbol)) return undefined
  return {
    spot: {
      symbol: spot.symbol,
      exchange: isString(spot.exchange) ? spot.exchange : "PAXOS",
      currency: isString(spot.currency) ? spot.currency : "USD",
    },
    futures: {
      symbol: futures.symbol,
      exchange: isString(futures.exchange) ? futures.exchange : "CME",
    },
  }
}

/** Map a parsed config file onto the config struct. */
export function fromFileObject(raw: Record<string, unknown>, origin = "config file"): Partial<BasisConfig> {
  const out: Partial<BasisConfig> = {}

  if (isObject(raw.alert_thresholds)) readNumbers(raw.alert_thresholds, ALERT_NUMBERS, out, origin)
  readNumbers(raw, FILE_NUMBERS, out, origin)

  const useEtf = toBoolean(raw.use_etf)
  if (useEtf !== undefined) out.useEtf = useEtf
  const applyCosts = toBoolean(raw.apply_trading_costs)
  if (applyCosts !== undefined) out.applyTradingCosts = applyCosts

  if (isObject(raw.databento) && isString(raw.databento.data_dir)) out.databentoDataDir = raw.databento.data_dir
  if (isString(raw.output_dir)) out.outputDir = raw.output_dir
  if (isString(raw.default_pair)) out.defaultPair = raw.default_pair

  if (isObject(raw.pairs)) {
    const pairs: Record<string, PairCfg> = {}
    for (const [name, v] of Object.entries(raw.pairs)) {
      const pair = parsePair(v)
      if (pair) pairs[name] = pair
      else log.warn(`ignoring malformed pair ${name} in ${origin}`)
    }
    out.pairs = pairs
  }

  return out
}

export function fromEnv(env: NodeJS.ProcessEnv): Partial<BasisConfig> {
  const out: Partial<BasisConfig> = {}
  readNumbers(env, ENV_NUMBERS, out, "environment")
  const applyCosts = toBoolean(env.BASIS_APPLY_TRADING_COSTS)
  if (applyCosts !== undefined) out.applyTradingCosts = applyCosts
  const useEtf = toBoolean(env.BASIS_USE_ETF)
  if (useEtf !== undefined) out.useEtf = useEtf
  if (env.BASIS_OUTPUT_DIR) out.outputDir = env.BASIS_OUTPUT_DIR
  if (env.DATABENTO_DATA_DIR) out.databentoDataDir = env.DATABENTO_DATA_DIR
  return out
}

/* ---------------- file loading ---------------- */

function readJSONFile(file: string): Result<unknown> {
  const parsed = resultifySync((): unknown => JSON.parse(fs.readFileSync(file, "utf8")))
  return parsed.ok ? parsed : err(makeError("Config", `Invalid JSON in ${file}`, parsed.error, { file }))
}

function resolveConfigFile(file?: string): string | undefined {
  if (file) return file
  return CONFIG_SEARCH_PATHS.find(p => fs.existsSync(p))
}

function loadFileLayer(file?: string): Partial<BasisConfig> {
  const path = resolveConfigFile(file)
  if (!path || !fs.existsSync(path)) {
    log.info(`config file not found: ${path ?? CONFIG_SEARCH_PATHS[0]}, using defaults`)
    return {}
  }
  const parsed = readJSONFile(path)
  if (!parsed.ok) {
    log.warn(parsed.error.message)
    return {}
  }
  if (!isObject(parsed.value)) {
    log.warn(`config file ${path} is not a JSON object, ignoring it`)
    return {}
  }
  log.debug(`config loaded from ${path}`)
  return fromFileObject(parsed.value, path)
}

function mergeLayers(layers: Partial<BasisConfig>[]): BasisConfig {
  const base = getDefaults()
  let merged: BasisConfig = base
  for (const layer of layers) {
    // pairs add to (rather than replace) the defaults
    const pairs = layer.pairs ? { ...merged.pairs, ...layer.pairs } : merged.pairs
    merged = { ...merged, ...layer, pairs }
  }
  return merged
}

let dotenvLoaded = false

export function loadConfig(opts: LoadConfigOptions = {}): BasisConfig {
  let env = opts.env
  if (!env) {
    if (!dotenvLoaded) {
      dotenv.config()
      dotenvLoaded = true
    }
    env = process.env
  }

  return mergeLayers([loadFileLayer(opts.file), fromEnv(env), opts.overrides ?? {}])
}

/**
 * Read an optimizer best-params file (entry_threshold, stop_loss_threshold,
 * exit_threshold, holding_days) into a partial config.
 */
export function loadParamsFile(file: string): Result<Partial<BasisConfig>> {
  if (!fs.existsSync(file)) {
    return err(makeError("Config", `Params file not found: ${file}`, undefined, { file }))
  }
  const parsed = readJSONFile(file)
  if (!parsed.ok) return parsed
  if (!isObject(parsed.value)) {
    return err(makeError("Config", `Params file ${file} is not a JSON object`, undefined, { file }))
  }
  const out: Partial<BasisConfig> = {}
  readNumbers(parsed.value, FILE_NUMBERS, out, file)
  return ok(out)
}

export type NamedPair = PairCfg & { name: string }

/** Pair by name, falling back to the default pair. */
export function getPair(config: BasisConfig, name?: string): NamedPair {
  const pairName = name ?? config.defaultPair
  const pair = config.pairs[pairName]
  if (!pair) {
    throw makeError(
      "Config",
      `Unknown pair '${pairName}'. Available: ${Object.keys(config.pairs).join(", ")}`,
      undefined,
      { pair: pairName }
    )
  }
  return { name: pairName, ...pair }
}

export function availablePairs(config: BasisConfig): string[] {
  return Object.keys(config.pairs)
}
