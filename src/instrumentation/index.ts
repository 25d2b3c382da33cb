export { default } from './tracer';
