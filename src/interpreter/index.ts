export {
  CommandInterpreter,
  DEFAULT_TIMEOUT_MS,
  type Interpretation,
  type InterpreterOptions,
  type InterpretOptions,
  type ReferenceResolution,
} from './command-interpreter.js';
