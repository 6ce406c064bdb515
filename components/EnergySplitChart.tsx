'use client';

import { BarChart, Bar, XAxis, YAxis, CartesianGrid, Tooltip, Legend, ResponsiveContainer } from 'recharts';
import { format, parseISO } from 'date-fns';
import useMediaQuery from '@/hooks/useMediaQuery';
import type { Bill } from '@/types/billing';

interface EnergySplitChartProps {
  bills: Bill[];
  title?: string;
}

export interface PeriodEnergy {
  period: string;
  label: string;
  localKwh: number;
  gridKwh: number;
  exportKwh: number;
}

const round3 = (value: number) => Math.round(value * 1000) / 1000;

/**
 * Collapses per-member bills into one bar per billing period
 */
export function summarizeByPeriod(bills: Bill[]): PeriodEnergy[] {
  const byPeriod = new Map<string, PeriodEnergy>();

  for (const bill of bills) {
    const entry = byPeriod.get(bill.period.key) ?? {
      period: bill.period.key,
      label: format(parseISO(bill.period.start), 'MMM yyyy'),
      localKwh: 0,
      gridKwh: 0,
      exportKwh: 0,
    };
    entry.localKwh = round3(entry.localKwh + bill.localKwh);
    entry.gridKwh = round3(entry.gridKwh + bill.gridKwh);
    entry.exportKwh = round3(entry.exportKwh + bill.exportKwh);
    byPeriod.set(bill.period.key, entry);
  }

  return [...byPeriod.values()].sort((a, b) => a.period.localeCompare(b.period));
}

export default function EnergySplitChart({ bills, title = 'Energy split by period' }: EnergySplitChartProps) {
  const isMobile = useMediaQuery('(max-width: 640px)');
  const data = summarizeByPeriod(bills);

  const local = data.reduce((sum, p) => sum + p.localKwh, 0);
  const grid = data.reduce((sum, p) => sum + p.gridKwh, 0);
  const selfSufficiency = local + grid > 0 ? (local / (local + grid)) * 100 : 0;

  return (
    <div className="bg-white rounded-lg shadow-sm border border-neutral-200 p-6">
      <div className="mb-4">
        <h3 className="text-lg font-semibold text-neutral-900">{title}</h3>
        <p className="text-sm text-neutral-600">
          Self-sufficiency: <span className="font-bold text-yellow-600">{selfSufficiency.toFixed(1)}%</span>
        </p>
      </div>

      <ResponsiveContainer width="100%" height={isMobile ? 300 : 400}>
        <BarChart data={data} margin={{ top: 5, right: 30, left: 20, bottom: 5 }}>
          <CartesianGrid strokeDasharray="3 3" stroke="#e5e5e5" />
          <XAxis dataKey="label" stroke="#525252" style={{ fontSize: isMobile ? '12px' : '14px' }} />
          <YAxis
            stroke="#525252"
            label={{ value: 'kWh', angle: -90, position: 'insideLeft', style: { fill: '#525252' } }}
          />
          <Tooltip formatter={(value: number) => `${value.toFixed(3)} kWh`} />
          <Legend />
          <Bar dataKey="localKwh" stackId="consumption" fill="#f59e0b" name="Local solar" />
          <Bar dataKey="gridKwh" stackId="consumption" fill="#3b82f6" name="Grid" />
          <Bar dataKey="exportKwh" fill="#10b981" name="Export" />
        </BarChart>
      </ResponsiveContainer>
    </div>
  );
}
