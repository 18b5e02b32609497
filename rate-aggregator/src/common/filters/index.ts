export { ServiceExceptionFilter } from './service-exception.filter';
