export { HandleSourceError } from './handle-source-error.decorator';
