export { AxiosTransport } from './AxiosTransport.js';
