/** Entry of `GET /p24api/pubinfo?exchange&coursid=5`; rates arrive as decimal strings. */
export interface PrivatBankRate {
  ccy: string;
  base_ccy: string;
  buy: string;
  sale: string;
}
