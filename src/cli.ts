import { writeFileSync } from "node:fs";
import { Command } from "commander";
import { getConfig } from "./config.js";
import { SummaryBuilder } from "./core/SummaryBuilder.js";
import { getLog, logError } from "./utils/logger.js";

const log = getLog(import.meta);

export interface SummaryCliOptions {
  indir: string;
  outfile?: string;
  contacts?: string;
}

export interface TextSink {
  write(chunk: string): unknown;
}

/** Returns the process exit code. The CLI always renders the authorized view. */
export function runSummary(opts: SummaryCliOptions, stdout: TextSink = process.stdout): number {
  const result = new SummaryBuilder({
    indir: opts.indir,
    contactsFile: opts.contacts,
    authorized: true,
  }).buildXml();

  if (!result.ok) {
    log.error(
      { code: result.error.code, field: result.error.field },
      result.error.message,
    );
    return 1;
  }

  if (!opts.outfile) {
    stdout.write(result.value);
    return 0;
  }
  try {
    writeFileSync(opts.outfile, result.value, "utf-8");
  } catch (e) {
    logError(log, e, `Cannot write ${opts.outfile}`);
    return 1;
  }
  return 0;
}

export function createProgram(stdout: TextSink = process.stdout): Command {
  const config = getConfig();
  const program = new Command();

  program
    .name("vosummary")
    .description("Render virtual organization records as a VO summary XML document")
    .argument("<indir>", "input dir for virtual-organizations data")
    .argument("[outfile]", "output file for vosummary (default: stdout)")
    .option("--contacts <file>", "contacts yaml file", config.VOSUMMARY_CONTACTS_FILE)
    .action((indir: string, outfile: string | undefined, options: { contacts?: string }) => {
      process.exitCode = runSummary({ indir, outfile, contacts: options.contacts }, stdout);
    });

  return program;
}
