export {
  CommandError,
  ParseError,
  AmbiguousReferenceError,
  EntityReferenceError,
  ValidationError,
  StoreIOError,
  ExternalServiceError,
  TimeoutError,
  toErrorPayload,
  type CommandErrorCode,
  type ErrorPayload,
  type EntityKind,
  type ReferenceCandidate,
} from './command-errors.js';
