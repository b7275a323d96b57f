export { CommandRunner, DEFAULT_COMMAND_TIMEOUT_MS } from './CommandRunner';
