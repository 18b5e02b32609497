export { PrivatBankAdapter } from './privatbank.adapter';
