#!/usr/bin/env node
import "reflect-metadata";
import { container } from "tsyringe";
import { loadConfig } from "./config/app.config";
import { parseCliArgs, USAGE } from "./config/cli-args";
import { setupDI } from "./config/di.setup";
import { IWeatherReportService } from "./services/weather-report.interface";
import { ConfigurationError } from "./types/error.types";
import { hasFailures } from "./types/result.types";
import { describeFailures, renderReport } from "./utils/report-format.util";

async function main(): Promise<number> {
  const cli = parseCliArgs(process.argv.slice(2));
  if (cli.help) {
    console.log(USAGE);
    return 0;
  }

  // Every input is checked here, before any request goes out
  const config = loadConfig(cli);
  setupDI(config);

  const reportService = container.resolve<IWeatherReportService>("IWeatherReportService");
  const report = await reportService.generateReport();

  const output = renderReport(report, config.output.delimiter);
  if (output) {
    console.log(output);
  }

  for (const failure of describeFailures(report)) {
    console.error(failure);
  }

  return hasFailures(report) ? 1 : 0;
}

main()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    if (error instanceof ConfigurationError) {
      console.error(`Configuration error: ${error.message}`);
    } else {
      console.error("Fatal error:", error);
    }
    process.exitCode = 1;
  });
