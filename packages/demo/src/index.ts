#!/usr/bin/env node
/**
 * @breakwater/demo: Terminal walkthrough.
 *
 * Narrates four liquidations against the real packages (no HTTP server):
 * the progressive ramp, the wallet-aware cap, racing initiators,
 * and seizing at the ceiling.
 *
 * Pass --fast to skip the pauses.
 */

import chalk from "chalk";
import { SCENARIOS } from "./scenarios.js";
import type { ScenarioResult, ScenarioStep } from "./scenarios.js";

// =============================================================================
// Helpers
// =============================================================================

const DELAY_MS = process.argv.includes("--fast") ? 0 : 500;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function banner(): void {
  console.log();
  console.log(chalk.cyan.bold("  ╔══════════════════════════════════════════════════════════╗"));
  console.log(chalk.cyan.bold("  ║") + chalk.white.bold("                    BREAKWATER DEMO                       ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ║") + chalk.gray("       Circuit-breaker liquidations, tick by tick         ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ╚══════════════════════════════════════════════════════════╝"));
  console.log();
}

function scenarioHeader(result: ScenarioResult, index: number, total: number): void {
  const prefix = chalk.cyan.bold(`  Scenario ${result.id} (${index}/${total})`);
  const line = chalk.gray("─".repeat(Math.max(4, 44 - result.title.length)));
  console.log(`\n${prefix}  ${chalk.white.bold(result.title)}  ${line}`);
}

function printStep(step: ScenarioStep): void {
  const tick = chalk.gray(`t=${step.tick.toString()}`.padEnd(6));
  const action = chalk.white(step.action.padEnd(22));
  if (step.outcome === "ok") {
    console.log(`    ${chalk.green("✓")} ${tick} ${action} ${chalk.gray(step.detail)}`);
  } else {
    console.log(`    ${chalk.red("✗")} ${tick} ${action} ${chalk.yellow(step.detail)}`);
  }
}

// =============================================================================
// Demo
// =============================================================================

async function run(): Promise<void> {
  banner();
  console.log(chalk.gray("  Cooldown 10 ticks, execution window 5 ticks."));
  console.log(chalk.gray("  Every step uses the real packages, no mocks.\n"));

  let rejected = 0;
  for (const [i, scenario] of SCENARIOS.entries()) {
    await sleep(DELAY_MS);
    const result = scenario();
    scenarioHeader(result, i + 1, SCENARIOS.length);
    for (const step of result.steps) {
      printStep(step);
      if (step.outcome === "rejected") {
        rejected++;
      }
    }
  }

  console.log();
  console.log(chalk.white("    Scenarios run:       ") + chalk.cyan.bold(String(SCENARIOS.length)));
  console.log(chalk.white("    Blocked attempts:    ") + chalk.cyan.bold(String(rejected)));
  console.log();
}

run().catch((err: unknown) => {
  console.error(chalk.red("\n  Demo failed:"), err);
  process.exit(1);
});
