import { createInterface } from 'node:readline/promises';
import { TransformationEngine } from '../engine/core';
import {
  demoCommand,
  describeFailure,
  importCommand,
  interactiveCommand,
  interrupt,
  listCommand,
  parseImportArgs,
  parseN,
  parseRunArgs,
  printHelp,
  runCommand,
  testCommand,
} from './pipelineCommands';

async function main(argv: string[]): Promise<void> {
  const controller = new AbortController();
  process.once('SIGINT', () => interrupt(controller));

  const [command, ...rest] = argv;
  switch (command) {
    case undefined:
      await interactiveCommand(createInterface({ input: process.stdin, output: process.stdout }), controller, {
        engine: new TransformationEngine({ verbose: true }),
      });
      break;

    case 'run':
      await runCommand(parseRunArgs(rest), {
        engine: new TransformationEngine({ verbose: true }),
        signal: controller.signal,
      });
      break;

    case 'import': {
      const { file, outputDir } = parseImportArgs(rest);
      if (file === undefined) {
        await listCommand(outputDir);
      } else {
        await importCommand(file);
      }
      break;
    }

    case 'test':
      if (testCommand() > 0) {
        process.exitCode = 1;
      }
      break;

    case 'demo':
      demoCommand();
      break;

    case 'help':
    case '--help':
      printHelp();
      break;

    default:
      console.error(`[pipeline] Unknown command '${command}'`);
      printHelp();
      process.exitCode = 1;
  }
}

main(process.argv.slice(2))
  .catch((error: unknown) => {
    console.error(describeFailure(error));
    process.exitCode = 1;
  })
  .finally(() => {
    process.removeAllListeners('SIGINT');
  });
