'use client';

import { useMemo } from 'react';
import { BarChart3, Table2, RotateCcw } from 'lucide-react';
import BillSkeleton from '@/components/BillSkeleton';
import BillTable from '@/components/BillTable';
import EnergySplitChart from '@/components/EnergySplitChart';
import MonthStatusPanel from '@/components/MonthStatusPanel';
import { useBillingRun } from '@/hooks/useBillingRun';
import { useBillingStore } from '@/stores/useBillingStore';

export default function BillingOverview() {
  const { data: run, isLoading, error } = useBillingRun();
  const {
    selectedPeriod,
    selectedMembers,
    view,
    setSelectedPeriod,
    toggleMember,
    setView,
    resetFilters,
  } = useBillingStore();

  const periods = useMemo(
    () => [...new Set((run?.bills ?? []).map((bill) => bill.period.key))],
    [run]
  );

  const members = useMemo(() => {
    const byId = new Map((run?.bills ?? []).map((bill) => [bill.memberId, bill.memberName]));
    return [...byId.entries()].sort((a, b) => a[1].localeCompare(b[1]));
  }, [run]);

  const visibleBills = (run?.bills ?? []).filter(
    (bill) =>
      (selectedPeriod === null || bill.period.key === selectedPeriod) &&
      (selectedMembers.length === 0 || selectedMembers.includes(bill.memberId))
  );

  return (
    <main className="min-h-screen bg-neutral-50 px-4 py-8">
      <div className="max-w-6xl mx-auto space-y-6">
        <header className="flex flex-wrap items-center justify-between gap-4">
          <div>
            <h1 className="text-3xl font-bold text-neutral-900">{run?.collective ?? 'Solar collective'}</h1>
            <p className="text-neutral-600">Billing overview</p>
          </div>
          <div className="flex items-center gap-2">
            <button
              onClick={() => setView('table')}
              className={`p-2 rounded ${view === 'table' ? 'bg-neutral-900 text-white' : 'bg-white border'}`}
              aria-label="Table view"
            >
              <Table2 className="h-4 w-4" />
            </button>
            <button
              onClick={() => setView('chart')}
              className={`p-2 rounded ${view === 'chart' ? 'bg-neutral-900 text-white' : 'bg-white border'}`}
              aria-label="Chart view"
            >
              <BarChart3 className="h-4 w-4" />
            </button>
            <button onClick={resetFilters} className="p-2 rounded bg-white border" aria-label="Reset filters">
              <RotateCcw className="h-4 w-4" />
            </button>
          </div>
        </header>

        {error && (
          <div className="bg-red-50 border border-red-200 rounded-lg p-4 text-red-700">{error.message}</div>
        )}

        {isLoading && <BillSkeleton />}

        {run && (
          <>
            <div className="flex flex-wrap gap-2">
              <select
                value={selectedPeriod ?? ''}
                onChange={(e) => setSelectedPeriod(e.target.value || null)}
                className="border rounded px-2 py-1 text-sm"
              >
                <option value="">All periods</option>
                {periods.map((period) => (
                  <option key={period} value={period}>
                    {period}
                  </option>
                ))}
              </select>
              {members.map(([id, name]) => (
                <label key={id} className="flex items-center gap-1 text-sm">
                  <input
                    type="checkbox"
                    checked={selectedMembers.includes(id)}
                    onChange={() => toggleMember(id)}
                  />
                  {name}
                </label>
              ))}
            </div>

            {view === 'table' ? <BillTable bills={visibleBills} /> : <EnergySplitChart bills={visibleBills} />}

            {run.excludedPeriods.length > 0 && (
              <p className="text-sm text-amber-700">
                Not yet billable: {run.excludedPeriods.map((e) => e.period.key).join(', ')}
              </p>
            )}

            <MonthStatusPanel months={run.months} excludedMonths={run.excludedMonths} />
          </>
        )}
      </div>
    </main>
  );
}
