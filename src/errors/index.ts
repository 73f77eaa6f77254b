export { AppError } from './AppError';
export {
  ValidationError,
  SourceFetchError,
  MalformedStatError,
  PersistenceError,
  CompilationInProgressError,
  type PersistenceErrorContext,
} from './statErrors';
