import type { Member } from '@/types/collective';
import type { Bill, BillExportRow } from '@/types/billing';

/**
 * Flatten a bill into one row of the accounting export
 *
 * Fees are summed into `fees_total`; each fee also gets its own `fee_<name>`
 * column so differently configured members still line up in a spreadsheet.
 */
export function toExportRow(bill: Bill, member: Member): BillExportRow {
  const row: BillExportRow = {
    period: bill.period.key,
    period_start: bill.period.start,
    period_end: bill.period.end,
    member_id: member.id,
    first_name: member.firstName,
    last_name: member.lastName,
    street: member.street,
    zip: member.zip,
    city: member.city,
    is_host: bill.isHost,
    is_producer: bill.isProducer,
    consumption_kwh: bill.consumptionKwh,
    local_kwh: bill.localKwh,
    grid_kwh: bill.gridKwh,
    production_kwh: bill.productionKwh,
    local_sold_kwh: bill.localSoldKwh,
    export_kwh: bill.exportKwh,
    local_rate: bill.rates.appliedLocalRate,
    grid_buy_rate: bill.rates.gridBuyRate,
    grid_sell_rate: bill.rates.gridSellRate,
    local_cost: bill.localCost,
    grid_cost: bill.gridCost,
    fees_total: bill.feesTotal,
    total_cost: bill.totalCost,
    local_sell_revenue: bill.localSellRevenue,
    export_revenue: bill.exportRevenue,
    total_revenue: bill.totalRevenue,
    net_amount: bill.netAmount,
    vat_rate: bill.vatRate,
    local_cost_incl_vat: bill.localCostInclVat,
    grid_cost_incl_vat: bill.gridCostInclVat,
    fees_total_incl_vat: bill.feesTotalInclVat,
    vat_amount: bill.vatAmount,
    total_cost_incl_vat: bill.totalCostInclVat,
    grand_total: bill.grandTotal,
    currency: bill.currency,
  };

  for (const fee of bill.fees) {
    row[`fee_${fee.name}`] = fee.amount;
  }

  return row;
}

/**
 * Export rows for every bill, ordered by period start, then last name, then id
 */
export function toExportRows(bills: Bill[], members: Member[]): BillExportRow[] {
  const byId = new Map(members.map((m) => [m.id, m]));

  return bills
    .flatMap((bill) => {
      const member = byId.get(bill.memberId);
      return member ? [{ bill, member }] : [];
    })
    .sort(
      (a, b) =>
        a.bill.period.start.localeCompare(b.bill.period.start) ||
        a.member.lastName.localeCompare(b.member.lastName) ||
        a.member.id.localeCompare(b.member.id)
    )
    .map(({ bill, member }) => toExportRow(bill, member));
}
