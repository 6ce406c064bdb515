export function formatMoney(amount: number, currency: string): string {
  return `${currency} ${amount.toFixed(2)}`;
}

export function formatKwh(kwh: number): string {
  return `${kwh.toFixed(3)} kWh`;
}
