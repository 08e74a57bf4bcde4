#!/usr/bin/env node
import fs from "fs";
import path from "path";
import { Command } from "commander";
import { runAnalyze } from "./commands/analyze";
import { runArchive } from "./commands/archive";
import { runClassify } from "./commands/classify";
import { runDoctor } from "./commands/doctor";
import { runList } from "./commands/list";
import { runRestart } from "./commands/restart";
import { runResume } from "./commands/resume";
import { runSkipClarification } from "./commands/skip-clarification";
import { runStart } from "./commands/start";
import { runStatus } from "./commands/status";
import { parseEffort, setFlags } from "./context/flags";
import { printError } from "./errors";
import { getRepoRoot } from "./paths";

const program = new Command();

type GlobalOptions = { workspace?: string; effort?: string };
type RunCommandOptions = { slug?: string; clarify?: boolean; skipClarification?: boolean };

function getVersion(): string {
  try {
    const pkgPath = path.join(getRepoRoot(), "package.json");
    const pkg: { version?: string } = JSON.parse(fs.readFileSync(pkgPath, "utf-8"));
    return pkg.version ?? "0.0.0";
  } catch {
    return "0.0.0";
  }
}

program
  .name("specloop")
  .description("Specification-driven workflow: constitution, specification, clarification, plan, tasks, implementation")
  .version(getVersion())
  .option("--workspace <path>", "Workspace root holding specloop.yml and .specloop/", process.cwd())
  .option("--effort <level>", "Generation effort: low|medium|high");

program.hook("preAction", (_thisCommand, actionCommand) => {
  const opts = actionCommand.optsWithGlobals<GlobalOptions>();
  if (opts.effort !== undefined && !parseEffort(opts.effort)) {
    printError("SPL-1002", `Unknown effort level: ${opts.effort}. Use low, medium or high.`);
    process.exit(1);
  }
  setFlags({
    workspace: path.resolve(opts.workspace ?? process.cwd()),
    effort: parseEffort(opts.effort)
  });
});

program
  .command("start")
  .description("Classify a request and, when it triggers, run the workflow for a new feature")
  .argument("<request...>", "What to build")
  .option("--slug <slug>", "Override the slug derived from the request")
  .option("--clarify", "Always run the clarification phase")
  .option("--skip-clarification", "Never run the clarification phase")
  .action((request: string[], options: RunCommandOptions) =>
    runStart(request.join(" "), {
      slug: options.slug,
      clarify: Boolean(options.clarify),
      skipClarification: Boolean(options.skipClarification)
    })
  );

program
  .command("resume")
  .description("Continue a feature from its first unsettled phase")
  .argument("<feature>", "Feature key, number or slug")
  .option("--clarify", "Always run the clarification phase")
  .option("--skip-clarification", "Never run the clarification phase")
  .action((feature: string, options: RunCommandOptions) =>
    runResume(feature, { clarify: Boolean(options.clarify), skipClarification: Boolean(options.skipClarification) })
  );

program
  .command("restart")
  .description("Reset a phase and every later one to PENDING, keeping artifacts and history")
  .argument("<feature>", "Feature key, number or slug")
  .option("--from <phase>", "First phase to reset", "constitution")
  .action((feature: string, options: { from: string }) => runRestart(feature, options.from));

program
  .command("skip-clarification")
  .description("Mark the clarification phase SKIPPED")
  .argument("<feature>", "Feature key, number or slug")
  .action((feature: string) => runSkipClarification(feature));

program
  .command("status")
  .description("Show phase statuses of one feature, or a summary of all active features")
  .argument("[feature]", "Feature key, number or slug")
  .action((feature?: string) => runStatus(feature));

program
  .command("list")
  .description("List features in number order")
  .option("--all", "Include archived features")
  .action((options: { all?: boolean }) => runList(Boolean(options.all)));

program
  .command("archive")
  .description("Archive a feature; its number is never reused")
  .argument("<feature>", "Feature key, number or slug")
  .action((feature: string) => runArchive(feature));

program
  .command("analyze")
  .description("Report cross-artifact traceability gaps and coverage")
  .argument("<feature>", "Feature key, number or slug")
  .option("--save", "Store the report as analysis.json beside the feature")
  .action((feature: string, options: { save?: boolean }) => runAnalyze(feature, Boolean(options.save)));

program
  .command("classify")
  .description("Show whether a request would trigger the workflow and at which tier")
  .argument("<request...>", "Request text")
  .action((request: string[]) => runClassify(request.join(" ")));

program
  .command("doctor")
  .description("Check configuration, templates, API key and stored data")
  .action(() => runDoctor());

program.parseAsync(process.argv).catch((error: unknown) => {
  printError("SPL-9000", error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
