/**
 * @touch/cli
 *
 * Barrel export for the command implementations behind the `touch` binary.
 */

export { cmdConvert, createServices } from './commands/convert.js';
export { cmdDoctor, doctorReport, type DoctorReport, type ToolAvailability } from './commands/doctor.js';
export {
  argValue,
  hasFlag,
  positionals,
  parseConvertArgs,
  defaultOutputPath,
  type ConvertArgs,
} from './utils/args.js';
export { UsageError } from './utils/errors.js';
export { ClackLogger } from './ui/logger.js';
