export * from '../interfaces/http-client.interface';
export * from './client-params';
