import { Command, Option } from "commander";

import { aggregateCommand, type AggregateFlags } from "./aggregate.js";
import { evaluateCommand, type EvaluateFlags } from "./evaluate.js";
import { addConfigFlags } from "./flags.js";
import { validateCommand, type ValidateFlags } from "./validate.js";

export function buildCli(): Command {
  const program = new Command();

  program
    .name("patchproof")
    .description("Run a test suite before and after a patch and judge whether the patch fixed it")
    .version("0.1.0")
    .option("--debug", "Show error codes, causes and stack traces", false);

  addConfigFlags(
    program
      .command("evaluate")
      .description("Pre phase, optional patch, post phase, diff and verdict in one run"),
  )
    .option("--run-id <id>", "Run id recorded in agent.log (default: timestamp)")
    .option("--patch-file <path>", "Apply this patch with `git apply` between the phases")
    .option("--patch-command <cmd>", "Run this command in the repo between the phases")
    .option("--fail-unresolved", "Exit with code 2 when the verdict is not resolved", false)
    .action(async (opts: EvaluateFlags) => {
      await evaluateCommand(opts);
    });

  addConfigFlags(
    program.command("validate").description("Run a single phase and save <phase>-result.json"),
  )
    .addOption(
      new Option("--phase <phase>", "Phase to run").choices(["pre", "post"]).makeOptionMandatory(),
    )
    .option("--run-id <id>", "Run id recorded in agent.log (default: timestamp)")
    .action(async (opts: ValidateFlags) => {
      await validateCommand(opts);
    });

  addConfigFlags(
    program
      .command("aggregate")
      .description("Combine saved phase results and changes.patch into results.json and report.html"),
  )
    .option("--fail-unresolved", "Exit with code 2 when the verdict is not resolved", false)
    .action(async (opts: AggregateFlags) => {
      await aggregateCommand(opts);
    });

  return program;
}
