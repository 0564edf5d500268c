#!/usr/bin/env node
import dotenv from "dotenv";
import { getEnv } from "./env";
import { ConfigError, errorMessage } from "./errors";
import { createYahooFetcher } from "./get-candles";
import { childLogger, setLogLevel } from "./logger";
import { createNotifiers } from "./notify";
import { exitCodeFor, runScan } from "./scanner";
import { loadSymbols } from "./symbols";

dotenv.config();

const log = childLogger("cli");

void (async () => {
  try {
    // erro de configuração aborta antes de qualquer chamada de rede
    const config = getEnv();
    setLogLevel(config.logLevel);
    const symbols = loadSymbols(config.symbolsFile, config.only);

    log.info("scan started", {
      symbols: symbols.map((s) => s.name),
      channels: config.dryRun ? "dry-run" : config.channels,
      mode: config.reportMode,
    });

    const result = await runScan(config, symbols, {
      fetchKlines: createYahooFetcher(config.fetch),
      notifiers: config.dryRun ? [] : createNotifiers(config),
    });

    process.exitCode = exitCodeFor(result, config.dryRun);
    const failed = result.reports.filter((r) => r.error).length;
    if (process.exitCode === 0) {
      log.info("scan finished", { symbols: result.reports.length, failed });
    } else {
      log.error("scan finished but nothing was delivered", { deliveries: result.deliveries });
    }
  } catch (err) {
    if (err instanceof ConfigError) {
      for (const problem of err.problems) log.error(problem);
    } else {
      log.error("scanner failed", { error: errorMessage(err) });
    }
    process.exitCode = 1;
  }
})();
