import { DEFAULT_PRECISION, type MarketSnapshot, type Precision } from "core-types";
import yargs from "yargs";
import { DEFAULT_CONFIG_PATH, loadConfig } from "./config/configManager";
import type { AppConfig } from "./config/schema";
import { MarketDataFetcher, type SnapshotSource } from "./market/dataFetcher";
import { applyOverrides, MarketSnapshotSchema } from "./market/snapshot";
import { priceOption } from "./pricer";
import { formatReport } from "./report";

export interface CliIO {
  log: (line: string) => void;
  error: (line: string) => void;
}

export interface CliDeps {
  io?: CliIO;
  loadConfig?: (configPath: string) => AppConfig;
  createSource?: (cfg: AppConfig) => SnapshotSource;
}

const PRECISIONS: readonly Precision[] = ["double", "single"];

function parseArgs(argv: string[]) {
  return yargs(argv)
    .scriptName("price-option")
    .usage("$0 --strike <K> --maturity <years> [--symbol <ticker> | --spot --vol --rate]")
    .option("symbol", { type: "string", desc: "underlying ticker, e.g. AAPL" })
    .option("strike", { type: "number", demandOption: true })
    .option("maturity", { type: "number", demandOption: true, desc: "time to expiry in years" })
    .option("notional", { type: "number", default: 1 })
    .option("type", { type: "string", choices: ["call", "put"] as const, default: "call" as const })
    .option("spot", { type: "number", desc: "override spot price" })
    .option("vol", { type: "number", desc: "override volatility (decimal)" })
    .option("rate", { type: "number", desc: "override risk-free rate (decimal)" })
    .option("precision", { type: "string", choices: PRECISIONS, default: DEFAULT_PRECISION })
    .option("config", { type: "string", default: DEFAULT_CONFIG_PATH })
    .strict()
    .fail(false)
    .version(false)
    .exitProcess(false)
    .help()
    .parseAsync();
}

/** Runs one pricing from CLI arguments; resolves to the process exit code. */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const io = deps.io ?? { log: console.log, error: console.error };

  try {
    const args = await parseArgs(argv);
    const overrides = { spotPrice: args.spot, volatility: args.vol, riskFreeRate: args.rate };

    let snapshot: MarketSnapshot;
    if (args.spot !== undefined && args.vol !== undefined && args.rate !== undefined) {
      snapshot = MarketSnapshotSchema.parse(overrides);
    } else {
      if (!args.symbol) {
        throw new Error("--symbol is required unless --spot, --vol and --rate are all given");
      }
      const cfg = (deps.loadConfig ?? loadConfig)(args.config);
      const source = deps.createSource?.(cfg) ?? new MarketDataFetcher(cfg);
      io.log(`[cli] Fetching market data for ${args.symbol}...`);
      snapshot = applyOverrides(await source.fetchStockData(args.symbol), overrides);
    }

    const report = priceOption({
      symbol: args.symbol,
      snapshot,
      strike: args.strike,
      maturity: args.maturity,
      notional: args.notional,
      isCall: args.type === "call",
      precision: args.precision,
    });
    io.log(formatReport(report));
    return 0;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    io.error(`Error: ${message}`);
    return 1;
  }
}
