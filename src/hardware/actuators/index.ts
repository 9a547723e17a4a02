export { setActuator } from './actuators';
