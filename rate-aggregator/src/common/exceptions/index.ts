export { ServiceException } from './service.exception';
