#!/usr/bin/env node
import { Command, Option, type CommanderError } from 'commander';

import type { Configuration, LogFormatName, LogSink } from './types.js';

import { ChatRenderer, runChatLoop } from './chat-loop.js';
import { CommandExecutor } from './command-executor.js';
import { resolveApiKey, resolveConfiguration } from './config-resolver.js';
import { CopilotSession } from './copilot-session.js';
import { createDemoSession } from './host/memory-host.js';
import { LLMClient } from './llm-client.js';
import { makeTTYLogSink } from './log-sink-tty.js';
import { createProviderDispatcher } from './setup-undici.js';
import { ShutdownController } from './shutdown-controller.js';
import { errorMessage, setWarningSink, warn } from './utils.js';
import { VERSION } from './version.js';

interface ChatOptions {
  config?: string;
  stream: boolean;
  maxSteps?: number;
  verbose?: boolean;
  traceLlm?: boolean;
  logFormat?: LogFormatName;
}

const shutdownController = new ShutdownController();

// Centralized exit path to guarantee a single, reasoned exit
let hasExited = false;
function exitWith(code: number, reason: string): never {
  if (code !== 0) {
    try { process.stderr.write(`[ERR] session-copilot: ${reason}\n`); } catch { /* stderr gone */ }
  }
  if (!hasExited) {
    hasExited = true;
    process.exit(code);
  }
  throw new Error('unreachable');
}

const defaultWarningSink = (message: string): void => {
  const prefix = '[warn] ';
  const colored = process.stderr.isTTY ? `\x1b[33m${prefix}${message}\x1b[0m` : `${prefix}${message}`;
  try { process.stderr.write(`${colored}\n`); } catch { /* stderr gone */ }
};

setWarningSink(defaultWarningSink);

const parsePositiveInt = (value: string): number => {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`expected a positive integer, got '${value}'`);
  }
  return parsed;
};

function applyOverrides(config: Configuration, opts: ChatOptions): Configuration {
  return {
    ...config,
    provider: { ...config.provider, stream: config.provider.stream && opts.stream },
    workflow: { ...config.workflow, maxSteps: opts.maxSteps ?? config.workflow.maxSteps },
    logging: {
      format: opts.logFormat ?? config.logging.format,
      verbose: opts.verbose === true || config.logging.verbose,
    },
  };
}

async function runChat(opts: ChatOptions): Promise<void> {
  const { config: fileConfig } = resolveConfiguration({ configPath: opts.config });
  const config = applyOverrides(fileConfig, opts);
  const sink: LogSink = makeTTYLogSink({
    verbose: config.logging.verbose,
    traceLlm: opts.traceLlm === true,
    explicitFormat: config.logging.format,
  });

  const apiKey = resolveApiKey(config);
  if (apiKey === undefined) {
    warn('no API key found; set ANTHROPIC_API_KEY or write it to ~/.config/session-copilot/anthropic_api_key');
  }
  const dispatcher = createProviderDispatcher(config.timeouts);
  const client = new LLMClient({
    provider: config.provider,
    timeouts: config.timeouts,
    apiKey,
    dispatcher,
    onLog: sink,
    traceLLM: opts.traceLlm === true,
  });
  const host = createDemoSession();
  const renderer = new ChatRenderer((text) => {
    process.stdout.write(text);
  });
  const session = new CopilotSession({
    transport: client,
    host,
    executor: new CommandExecutor({ timeoutMs: config.executor.timeoutMs, onLog: sink }),
    workflow: config.workflow,
    context: config.context,
    streaming: config.provider.stream,
    events: renderer.events(),
    onLog: sink,
  });

  shutdownController.register('transport', async () => {
    session.cancel();
    await client.idle();
    await dispatcher.close();
  });

  const onSigint = (): void => {
    if (session.cancel()) return;
    shutdownController.shutdown({ logger: sink })
      .then(() => { exitWith(130, 'interrupted'); })
      .catch((error: unknown) => { exitWith(1, `shutdown failed: ${errorMessage(error)}`); });
  };
  process.on('SIGINT', onSigint);

  renderer.line(`session-copilot ${VERSION}: connected to '${host.name}'. Type /help for commands.`);
  try {
    await runChatLoop({
      session,
      renderer,
      input: process.stdin,
      describeState: () => host.describeState(),
    });
  } finally {
    process.removeListener('SIGINT', onSigint);
    await shutdownController.shutdown({ logger: sink });
  }
}

const program = new Command();

// Route commander exits through the single exit path
program.exitOverride((err: CommanderError) => {
  exitWith(err.exitCode, `commander: ${err.message}`);
});

program
  .name('session-copilot')
  .description('Drive a mixing session with an AI copilot that writes and runs commands for you')
  .version(VERSION);

program
  .command('chat')
  .description('Start an interactive copilot conversation against the demo session')
  .option('--config <filename>', 'configuration file (highest priority layer)')
  .option('--no-stream', 'wait for complete replies instead of streaming them')
  .option('--max-steps <n>', 'maximum command steps per request', parsePositiveInt)
  .option('--verbose', 'log verbose transport and workflow events')
  .option('--trace-llm', 'trace provider requests and responses (API key redacted)')
  .addOption(new Option('--log-format <fmt>', 'log output format').choices(['logfmt', 'json', 'console']))
  .action(async (opts: ChatOptions) => {
    await runChat(opts);
  });

program
  .command('state')
  .description('Print the demo session state and capability catalog')
  .action(() => {
    const host = createDemoSession();
    process.stdout.write(`${host.describeState()}\n\n${host.capabilityCatalog()}\n`);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  exitWith(1, errorMessage(error));
});
