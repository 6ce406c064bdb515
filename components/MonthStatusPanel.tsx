'use client';

import { CheckCircle2, AlertTriangle } from 'lucide-react';
import type { ExcludedMonth, MonthStatus } from '@/types/billing';

interface MonthStatusPanelProps {
  months: MonthStatus[];
  excludedMonths: ExcludedMonth[];
}

export default function MonthStatusPanel({ months, excludedMonths }: MonthStatusPanelProps) {
  const reasons = new Map(excludedMonths.map((e) => [e.month, e.reason]));
  const billableCount = months.filter((m) => m.billable).length;

  return (
    <div className="bg-white rounded-lg shadow-sm border border-neutral-200 p-6">
      <div className="flex items-center justify-between mb-4">
        <h3 className="text-lg font-semibold text-neutral-900">Data completeness</h3>
        <span className="text-sm text-neutral-500">
          {billableCount} of {months.length} months billable
        </span>
      </div>

      <ul className="space-y-2">
        {months.map((status) => (
          <li key={status.month} className="flex items-start gap-2 text-sm" data-testid={`month-${status.month}`}>
            {status.billable ? (
              <CheckCircle2 className="h-4 w-4 mt-0.5 text-green-600" aria-label="billable" />
            ) : (
              <AlertTriangle className="h-4 w-4 mt-0.5 text-amber-600" aria-label="not billable" />
            )}
            <div>
              <span className="font-medium text-neutral-900">{status.month}</span>
              <span className="text-neutral-500"> · {status.expectedSlots} slots</span>
              {!status.billable && reasons.get(status.month) && (
                <p className="text-xs text-amber-700">{reasons.get(status.month)}</p>
              )}
              {status.warnings.map((warning) => (
                <p key={warning} className="text-xs text-neutral-500">
                  {warning}
                </p>
              ))}
            </div>
          </li>
        ))}
      </ul>
    </div>
  );
}
