#!/usr/bin/env node

/**
 * MacroDeck
 *
 * Plays back input macros: timed key steps with advisory controller
 * checks, and frame streams sent to a remote consumer over UDP.
 *
 * Usage:
 *   macrodeck                          # Serve: control server + hotkeys, macros.json
 *   macrodeck --config ./deck.yml      # Use a specific config file
 *   macrodeck --list                   # List library macros and exit
 *   macrodeck --snippet Flip           # Print a macro as a text snippet and exit
 *   macrodeck --run Flip               # Play one macro and exit when it ends
 *   macrodeck --export Flip            # Write a macro's snippet to Flip.txt and exit
 *   macrodeck --emulate-consumer       # Stream frames to a local consumer emulator
 */

import * as fs from 'fs';
import { Logger } from 'pino';
import { applyOverrides, loadConfig, resolveConfigPath, Config } from './config';
import { initLogger, getLogger } from './logger';
import { MacroDeck } from './deck';
import { MacroLibrary, Macro, macroToSnippet, exportSnippet } from './library';
import { FrameConsumerEmulator } from './emulators/frame-consumer';
import { StreamEvent } from './output/frame-sink';

type Override = string | number | boolean;

interface CliOptions {
  configPath?: string;
  overrides: Record<string, Override>;
  list: boolean;
  snippet?: string;
  run?: string;
  exportName?: string;
  emulateConsumer: boolean;
}

function printBanner(): void {
  console.log('');
  console.log('  MacroDeck');
  console.log('  Input macro playback: key steps and frame streams');
  console.log('');
}

function printOSCReference(): void {
  console.log('  Control Addresses:');
  console.log('  ─────────────────────────────────────────────');
  console.log('    /macro/run        string name    Run a macro by name');
  console.log('    /macro/stop                      Stop the running macro');
  console.log('    /hotkey           string key     Run the macro bound to a key');
  console.log('    /{trigger}                       Run the macro with that trigger address');
  console.log('');
  console.log('  Controller Input (when input.enabled):');
  console.log('    /input/button/{name}  int 0|1    Button down / up');
  console.log('    /input/axes           float x y  Left stick, -1.0 to 1.0');
  console.log('    /input/pressed        string...  Full set of pressed buttons');
  console.log('    /input/reset                     Release everything');
  console.log('  ─────────────────────────────────────────────');
  console.log('');
}

function requireValue(argv: string[], i: number, flag: string, example: string): string {
  const value = argv[i];
  if (!value || value.startsWith('-')) {
    console.error(`[Error] ${flag} requires a value (e.g. ${flag} ${example})`);
    process.exit(1);
  }
  return value;
}

function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = { overrides: {}, list: false, emulateConsumer: false };

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--config':
      case '-c':
        options.configPath = requireValue(argv, ++i, arg, './macrodeck.yml');
        break;
      case '--library':
      case '-l':
        options.overrides['library.path'] = requireValue(argv, ++i, arg, './macros.json');
        break;
      case '--port':
      case '-p':
        options.overrides['control.listenPort'] = parseInt(requireValue(argv, ++i, arg, '9000'), 10);
        break;
      case '--no-control':
        options.overrides['control.enabled'] = false;
        break;
      case '--verbose':
      case '-v':
        options.overrides['logging.verbose'] = true;
        break;
      case '--list':
        options.list = true;
        break;
      case '--snippet':
        options.snippet = requireValue(argv, ++i, arg, 'Flip');
        break;
      case '--run':
        options.run = requireValue(argv, ++i, arg, 'Flip');
        break;
      case '--export':
        options.exportName = requireValue(argv, ++i, arg, 'Flip');
        break;
      case '--emulate-consumer':
        options.emulateConsumer = true;
        break;
      case '--help':
      case '-h':
        printBanner();
        printOSCReference();
        console.log('  Options:');
        console.log('    --config, -c <path>   Path to config YAML file (default macrodeck.yml)');
        console.log('    --library, -l <path>  Macro library JSON file (default macros.json)');
        console.log('    --port, -p <port>     Control server listen port (default 9000)');
        console.log('    --no-control          Do not start the control server');
        console.log('    --verbose, -v         Enable verbose logging');
        console.log('    --list                List library macros and exit');
        console.log('    --snippet <name>      Print a macro as a text snippet and exit');
        console.log('    --run <name>          Play one macro, then exit');
        console.log('    --export <name>       Write a macro snippet to <name>.txt in the working directory');
        console.log('    --emulate-consumer    Stream frames to a local consumer emulator');
        console.log('    --help, -h            Show this help');
        console.log('');
        process.exit(0);
      default:
        console.error(`[Error] Unknown option: ${arg}`);
        process.exit(1);
    }
  }

  return options;
}

function describeTrigger(macro: Macro): string {
  const parts: string[] = [];
  if (macro.hotkey) parts.push(`hotkey ${macro.hotkey}`);
  if (macro.trigger) parts.push(`osc ${macro.trigger}`);
  return parts.length > 0 ? parts.join(', ') : '-';
}

function printLibrary(library: MacroLibrary): void {
  const macros = library.list();
  console.log(`  ${macros.length} macro(s) in ${library.path}`);
  console.log('');
  for (const macro of macros) {
    const flag = macro.enabled ? '  ' : '--';
    const name = macro.name.padEnd(24);
    const kind = macro.kind.padEnd(6);
    const count = String(macro.sequence.length).padStart(3);
    console.log(`  ${flag} ${name} ${kind} ${count}  ${describeTrigger(macro)}`);
  }
  console.log('');
}

function printSnippet(library: MacroLibrary, name: string): boolean {
  const macro = library.get(name);
  if (!macro) {
    console.error(`[Error] No macro named "${name}" in ${library.path}`);
    return false;
  }
  console.log(macroToSnippet(macro));
  return true;
}

function exportMacro(library: MacroLibrary, name: string, log: Logger): boolean {
  const macro = library.get(name);
  if (!macro) {
    console.error(`[Error] No macro named "${name}" in ${library.path}`);
    return false;
  }
  const filePath = exportSnippet(macro, process.cwd());
  log.info(`Exported "${macro.name}" to ${filePath}`);
  return true;
}

async function startConsumerEmulator(config: Config, log: Logger): Promise<FrameConsumerEmulator> {
  const emulator = new FrameConsumerEmulator({ listenAddress: '127.0.0.1', listenPort: config.stream.port });
  emulator.on('event', (event: StreamEvent) => {
    if (event.type === 'reset') {
      log.info(`Consumer reset after "${event.name}": ${JSON.stringify(emulator.getHolding())}`);
    }
  });
  await emulator.start();
  return emulator;
}

async function main(): Promise<void> {
  const options = parseArgs(process.argv);

  printBanner();

  if (options.configPath && !fs.existsSync(options.configPath)) {
    console.error(`[Error] Config file not found: ${options.configPath}`);
    process.exit(1);
  }

  // Logging is configured from the file, so read it before any logger exists
  const configFile = resolveConfigPath(options.configPath);
  let config = loadConfig(configFile, null);
  if (options.emulateConsumer) {
    options.overrides['stream.host'] = '127.0.0.1';
  }
  if (options.run !== undefined) {
    options.overrides['control.enabled'] = false;
  }
  config = applyOverrides(config, options.overrides);

  initLogger({
    level: config.logging.level ?? (config.logging.verbose ? 'debug' : 'info'),
    pretty: config.logging.pretty,
  });
  const log = getLogger('Main');
  log.info(fs.existsSync(configFile) ? `Loaded ${configFile}` : `No config file found at ${configFile}, using defaults`);

  const library = new MacroLibrary(config.library.path);
  library.load();

  if (options.list) {
    printLibrary(library);
    return;
  }
  if (options.snippet !== undefined) {
    process.exitCode = printSnippet(library, options.snippet) ? 0 : 1;
    return;
  }
  if (options.exportName !== undefined) {
    process.exitCode = exportMacro(library, options.exportName, log) ? 0 : 1;
    return;
  }

  const emulator = options.emulateConsumer ? await startConsumerEmulator(config, log) : null;
  const deck = new MacroDeck(config, { library });
  await deck.start();

  const shutdown = async (): Promise<void> => {
    log.info('Shutting down...');
    await deck.shutdown();
    emulator?.stop();
  };

  if (options.run !== undefined) {
    if (!deck.runMacro(options.run)) {
      await shutdown();
      process.exitCode = 1;
      return;
    }
    const outcome = await deck.whenIdle();
    await shutdown();
    process.exitCode = outcome === 'completed' ? 0 : 1;
    return;
  }

  if (deck.controlPort !== null) {
    log.info(`Control server on port ${deck.controlPort}; ${library.size} macro(s) ready`);
  } else {
    log.info(`Control server disabled; ${library.size} macro(s) loaded`);
  }

  process.on('SIGINT', () => {
    shutdown()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        log.error({ err }, 'Shutdown failed');
        process.exit(1);
      });
  });
}

main().catch((err: unknown) => {
  console.error('[Fatal]', err instanceof Error ? err.message : err);
  process.exit(1);
});
