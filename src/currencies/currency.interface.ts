export interface Currency {
  code: string;
  name: string;
  symbol?: string;
  popular: boolean;
}

export interface ListCurrenciesOptions {
  popular?: boolean;
  search?: string;
}
