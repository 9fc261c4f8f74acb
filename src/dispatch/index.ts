export { RequestDispatcher, type DispatchRequest, type HttpMethod } from './dispatcher.js';
