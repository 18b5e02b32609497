export { MonobankAdapter } from './monobank.adapter';
