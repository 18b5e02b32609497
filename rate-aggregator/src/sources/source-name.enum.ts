export enum SourceName {
  PRIVATBANK = 'privatbank',
  MONOBANK = 'monobank',
}
