export { SourcesExceptionFilter } from './sources-exception.filter';
