/**
 * CLI Bootstrap
 * Creates and configures the Commander.js CLI application
 */

import { Command } from 'commander';
import { NAME, VERSION } from '../version.js';
import { runController, type CliOptions } from './run-controller.js';

export function createCLI(): Command {
  const program = new Command();

  program
    .name(NAME)
    .version(VERSION)
    .description(
      'Takes fan control away from the BMC when passively cooled NVIDIA GPUs run hot, ' +
      'drives the fans from the hottest card, and hands control back once they cool down.',
    )
    .option('-c, --config <file>', 'YAML or JSON configuration file')
    .option('--poll-interval <seconds>', 'Seconds between temperature polls (default: 3)')
    .option('--enter-manual <celsius>', 'Take manual fan control at or above this GPU temperature (default: 55)')
    .option('--exit-manual <celsius>', 'Return control to the BMC at or below this GPU temperature (default: 45)')
    .option('--curve-min <celsius>', 'Temperature mapped to the minimum duty (default: 55)')
    .option('--curve-max <celsius>', 'Temperature mapped to the maximum duty (default: 80)')
    .option('--min-duty <percent>', 'Lowest duty the curve will set (default: 50)')
    .option('--max-duty <percent>', 'Highest duty the curve will set (default: 100)')
    .option('--ignore-gpus <indices>', 'GPU index or comma-separated indices to leave out, e.g. 0,1')
    .option('--handoff-delay <seconds>', 'Seconds GPUs must stay cool before control returns to the BMC (default: 0)')
    .option('--idle-utilization <percent>', 'Only return control to the BMC while utilization is at or below this')
    .option('--sanity-min <celsius>', 'Discard readings below this temperature')
    .option('--sanity-max <celsius>', 'Discard readings above this temperature')
    .option('--command-timeout <seconds>', 'Timeout for each nvidia-smi or ipmitool call (default: 10)')
    .option('--actuator-retries <count>', 'Retries for a failed fan command before giving up (default: 2)')
    .option('--nvidia-smi <path>', 'nvidia-smi binary (default: nvidia-smi)')
    .option('--ipmitool <path>', 'ipmitool binary (default: ipmitool)')
    .option('--log-level <level>', 'fatal, error, warn, info, debug, trace or silent')
    .option('--pretty', 'Human-readable log output')
    .option('--skip-dependency-check', 'Do not verify that nvidia-smi and ipmitool are installed')
    .addHelpText(
      'after',
      '\nAim for a configuration that hands control back to the BMC whenever the GPUs are idle;\n' +
      'while this controller holds the fans, the BMC cannot react to CPU or disk temperatures.',
    )
    .action(async (options: CliOptions) => {
      process.exitCode = await runController(options);
    });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const cli = createCLI();

  try {
    await cli.parseAsync(argv);
  } catch (error) {
    if (error instanceof Error) {
      console.error(`\n${NAME}: ${error.message}\n`);
      if (process.env.DEBUG) {
        console.error(error.stack);
      }
    }
    process.exitCode = 1;
  }
}
