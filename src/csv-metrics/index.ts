export { default } from './csv-metrics';
