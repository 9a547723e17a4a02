export { readInput } from './inputs';
