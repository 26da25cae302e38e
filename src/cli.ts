#!/usr/bin/env node
import "dotenv/config";
import { createInterface } from "node:readline";
import {
  createAppLogging,
  createInsightCaptureApp,
  type InsightCaptureApp
} from "./app";
import { USAGE, applyArgs, formatResult, parseArgs, type CliArgs } from "./cliOptions";
import { readSettings } from "./config/settings";
import { describeError } from "./errors";
import type { ProcessingResult } from "./types/contracts";

async function main(): Promise<number> {
  let args: CliArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (error) {
    console.error(describeError(error));
    console.error(USAGE);
    return 2;
  }
  if (args.help) {
    console.log(USAGE);
    return 0;
  }

  const settings = applyArgs(readSettings(), args);
  const logger = createAppLogging(settings);
  const app = await createInsightCaptureApp(settings, logger);

  try {
    if (args.audio) {
      return await processOnce(app, args.audio);
    }
    await runInteractive(app);
    return 0;
  } finally {
    await app.dispose();
  }
}

async function processOnce(app: InsightCaptureApp, audioPath: string): Promise<number> {
  const outcome: { result?: ProcessingResult; error?: string } = {};
  const unsubscribe = app.orchestrator.subscribe({
    onProcessingComplete: (result) => {
      outcome.result = result;
    },
    onError: (message) => {
      outcome.error = message;
    }
  });

  try {
    if (!(await app.orchestrator.processFile(audioPath))) {
      console.error("Pipeline is busy");
      return 1;
    }
    await app.orchestrator.whenIdle();
  } finally {
    unsubscribe();
  }

  const { result } = outcome;
  if (result) {
    console.log("Pipeline results:");
    console.log(formatResult(result));
    console.log("");
    console.log(result.capsule);
    return 0;
  }
  console.error(`Pipeline failed: ${outcome.error ?? "no result"}`);
  return 1;
}

async function runInteractive(app: InsightCaptureApp): Promise<void> {
  const { orchestrator, drafter, searcher, store, availability } = app;
  let latest: ProcessingResult | undefined;

  orchestrator.subscribe({
    onRecordingStart: () => console.log("Recording... (type 'stop' or go quiet to finish)"),
    onRecordingStop: () => console.log("Recording stopped. Processing..."),
    onProcessingComplete: (result) => {
      latest = result;
      console.log("Insight capsule ready:");
      console.log(formatResult(result));
      console.log("");
      console.log(result.capsule);
    },
    onError: (message) => console.error(`Error: ${message}`)
  });

  const appendToLatest = async (section: string, generate: (r: ProcessingResult) => Promise<string>) => {
    if (!latest) {
      console.log("No capsule yet. Record one first.");
      return;
    }
    console.log(`Generating ${section.toLowerCase()}...`);
    const content = await generate(latest);
    await store.appendSection(latest.logPath, section, content);
    console.log(content);
    console.log(`Appended to ${latest.logPath}`);
  };

  console.log("Insight Capsule ready.");
  console.log(`Backends: local=${availability.local} remote=${availability.remote}`);
  console.log("Commands: start, stop, toggle, status, search <query>, outline, draft, takeaways, quit");

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  rl.setPrompt("insight> ");
  rl.prompt();

  for await (const line of rl) {
    const [command = "", ...rest] = line.trim().split(/\s+/);
    try {
      switch (command.toLowerCase()) {
        case "":
          break;
        case "start":
          if (!(await orchestrator.startRecording())) {
            console.log(`Cannot start while ${orchestrator.state}`);
          }
          break;
        case "stop":
          if (!(await orchestrator.stopRecording())) {
            console.log("No recording in progress");
          }
          break;
        case "toggle":
          if (!(await orchestrator.toggle())) {
            console.log(`Nothing to do while ${orchestrator.state}`);
          }
          break;
        case "status":
          console.log(`State: ${orchestrator.state}`);
          console.log(`Latest capsule: ${latest ? latest.title : "none"}`);
          if (searcher) {
            console.log(`Indexed insights: ${searcher.insightCount}`);
          }
          break;
        case "search": {
          const query = rest.join(" ");
          if (!searcher) {
            console.log("Insight search is disabled");
          } else if (!query) {
            console.log("Usage: search <query>");
          } else {
            console.log(await searcher.synthesizeAnswer(query));
          }
          break;
        }
        case "outline":
          await appendToLatest("Blog Outline", (r) => drafter.generateBlogOutline(r.capsule, r.transcript));
          break;
        case "draft":
          await appendToLatest("First Draft", (r) => drafter.generateFirstDraft(r.capsule, r.transcript));
          break;
        case "takeaways":
          await appendToLatest("Key Takeaways", (r) => drafter.generateKeyTakeaways(r.capsule));
          break;
        case "quit":
        case "exit":
          rl.close();
          return;
        default:
          console.log("Unknown command. Available: start, stop, toggle, status, search, outline, draft, takeaways, quit");
      }
    } catch (error) {
      console.error(`Error: ${describeError(error)}`);
    }
    rl.prompt();
  }
}

if (require.main === module) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(`Fatal: ${describeError(error)}`);
      process.exitCode = 1;
    });
}
