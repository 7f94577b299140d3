export { logger, createServiceLogger } from './logger';

export {
  CommandContext,
  getCommandId,
  commandLogFields,
  addCommandFields,
  runCommandScope,
} from './log-context';
