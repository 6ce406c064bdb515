'use client';

import useMediaQuery from '@/hooks/useMediaQuery';
import { formatKwh, formatMoney } from '@/lib/format';
import type { Bill } from '@/types/billing';
import { Home, Sun, Zap } from 'lucide-react';

interface BillTableProps {
  bills: Bill[];
  title?: string;
}

function RoleBadges({ bill }: { bill: Bill }) {
  return (
    <span className="inline-flex gap-1">
      {bill.isHost && (
        <span className="inline-flex items-center gap-0.5 text-xs text-amber-700" title="Host">
          <Home className="h-3 w-3" aria-hidden="true" />
          Host
        </span>
      )}
      {bill.isProducer && (
        <span className="inline-flex items-center gap-0.5 text-xs text-yellow-600" title="Producer">
          <Sun className="h-3 w-3" aria-hidden="true" />
          Producer
        </span>
      )}
    </span>
  );
}

export default function BillTable({ bills, title = 'Bills' }: BillTableProps) {
  const isMobile = useMediaQuery('(max-width: 768px)');

  if (bills.length === 0) {
    return (
      <div className="bg-white rounded-lg shadow-sm border border-neutral-200 p-6">
        <h3 className="text-lg font-semibold text-neutral-900 mb-2">{title}</h3>
        <p className="text-sm text-neutral-500">No billable period yet.</p>
      </div>
    );
  }

  const currency = bills[0].currency;
  const netTotal = bills.reduce((sum, bill) => sum + bill.netAmount, 0);

  return (
    <div className="bg-white rounded-lg shadow-sm border border-neutral-200 p-6">
      <h3 className="text-lg font-semibold text-neutral-900 mb-4">{title}</h3>

      {isMobile ? (
        <div className="space-y-4">
          {bills.map((bill) => (
            <div
              key={`${bill.period.key}-${bill.memberId}`}
              data-testid="bill-card"
              className="border border-neutral-200 rounded-lg p-4 space-y-3"
            >
              <div className="flex items-center justify-between pb-2 border-b border-neutral-200">
                <span className="font-semibold text-neutral-900">{bill.memberName}</span>
                <span className="text-sm text-neutral-500">{bill.period.key}</span>
              </div>
              <RoleBadges bill={bill} />
              <div className="grid grid-cols-2 gap-3 text-sm">
                <div>
                  <div className="flex items-center gap-1.5 text-xs text-neutral-500 mb-1">
                    <Sun className="h-3 w-3" aria-hidden="true" />
                    <span>Local</span>
                  </div>
                  <p>{formatKwh(bill.localKwh)}</p>
                </div>
                <div>
                  <div className="flex items-center gap-1.5 text-xs text-neutral-500 mb-1">
                    <Zap className="h-3 w-3" aria-hidden="true" />
                    <span>Grid</span>
                  </div>
                  <p>{formatKwh(bill.gridKwh)}</p>
                </div>
              </div>
              <div className="pt-2 border-t border-neutral-200">
                <p className="text-xs text-neutral-500">Net</p>
                <p className="text-2xl font-bold text-neutral-900">{formatMoney(bill.netAmount, bill.currency)}</p>
              </div>
            </div>
          ))}
        </div>
      ) : (
        <div className="overflow-x-auto">
          <table className="min-w-full divide-y divide-neutral-200 text-sm">
            <thead>
              <tr className="text-left text-xs uppercase tracking-wider text-neutral-500">
                <th className="px-3 py-2">Period</th>
                <th className="px-3 py-2">Member</th>
                <th className="px-3 py-2 text-right">Local</th>
                <th className="px-3 py-2 text-right">Grid</th>
                <th className="px-3 py-2 text-right">Export</th>
                <th className="px-3 py-2 text-right">Cost</th>
                <th className="px-3 py-2 text-right">Revenue</th>
                <th className="px-3 py-2 text-right">Net</th>
              </tr>
            </thead>
            <tbody className="divide-y divide-neutral-100">
              {bills.map((bill) => (
                <tr key={`${bill.period.key}-${bill.memberId}`}>
                  <td className="px-3 py-2 text-neutral-600">{bill.period.key}</td>
                  <td className="px-3 py-2">
                    <div className="font-medium text-neutral-900">{bill.memberName}</div>
                    <RoleBadges bill={bill} />
                  </td>
                  <td className="px-3 py-2 text-right">{formatKwh(bill.localKwh)}</td>
                  <td className="px-3 py-2 text-right">{formatKwh(bill.gridKwh)}</td>
                  <td className="px-3 py-2 text-right">{formatKwh(bill.exportKwh)}</td>
                  <td className="px-3 py-2 text-right">{formatMoney(bill.totalCost, bill.currency)}</td>
                  <td className="px-3 py-2 text-right">{formatMoney(bill.totalRevenue, bill.currency)}</td>
                  <td
                    className={`px-3 py-2 text-right font-semibold ${
                      bill.netAmount < 0 ? 'text-green-600' : 'text-neutral-900'
                    }`}
                  >
                    {formatMoney(bill.netAmount, bill.currency)}
                  </td>
                </tr>
              ))}
            </tbody>
            <tfoot>
              <tr className="font-bold">
                <td className="px-3 py-2" colSpan={7}>
                  Net total
                </td>
                <td className="px-3 py-2 text-right" data-testid="net-total">
                  {formatMoney(netTotal, currency)}
                </td>
              </tr>
            </tfoot>
          </table>
        </div>
      )}
    </div>
  );
}
