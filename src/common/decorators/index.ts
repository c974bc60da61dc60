export { SingleFlight } from './single-flight.decorator';
