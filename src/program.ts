import { Command, Option, type OutputConfiguration } from "commander";
import { generateCmd } from "./commands/generate.js";
import { parseStyleMode } from "./config.js";
import { UsageError } from "./errors.js";
import { readVersion } from "./version.js";

type GenerateFlags = {
  filterColumns?: boolean;
  style?: string;
  title?: string;
  heading?: string;
  stylesheet?: string;
};

/**
 * Builds the CLI. Argument errors surface as UsageError after commander has
 * printed the message and usage; help and version still exit 0.
 */
export function buildProgram(output?: OutputConfiguration): Command {
  const program = new Command();

  if (output) program.configureOutput(output);
  program
    .showHelpAfterError()
    .exitOverride((err) => {
      if (err.exitCode !== 0) throw new UsageError(err.message);
    });

  program
    .name("csv-table-site")
    .description("Turn a CSV export into a static, searchable HTML table page")
    .version(readVersion());

  program
    .command("generate")
    .description("Render <input.csv> into <output.html>")
    .argument("<input.csv>", "CSV file; first row is the header")
    .argument("<output.html>", "page to write (parent directories are created)")
    .allowExcessArguments(false)
    .option("--filter-columns", "drop columns whose header is blank (default)")
    .option("--no-filter-columns", "keep every column, even with a blank header")
    .addOption(new Option("--style <mode>", "inline the stylesheet or link a copied styles.css").choices(["inline", "link"]))
    .option("--title <text>", "document <title>")
    .option("--heading <text>", "page heading")
    .option("--stylesheet <path>", "stylesheet to inline or publish instead of the bundled one")
    .action(async (input: string, outFile: string, flags: GenerateFlags) => {
      await generateCmd(input, outFile, {
        filterBlankColumns: flags.filterColumns,
        style: flags.style === undefined ? undefined : parseStyleMode(flags.style),
        title: flags.title,
        heading: flags.heading,
        stylesheetPath: flags.stylesheet,
      });
    });

  return program;
}
