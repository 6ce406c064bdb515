/**
 * Placeholder rows shown while a billing run is loading
 */

interface BillSkeletonProps {
  rows?: number;
  columns?: number;
}

export default function BillSkeleton({ rows = 4, columns = 6 }: BillSkeletonProps) {
  return (
    <div
      className="bg-white rounded-lg shadow-sm border border-neutral-200 p-6 space-y-3"
      role="status"
      aria-label="Loading bills"
    >
      <div className="h-6 bg-neutral-200 rounded w-1/3 animate-pulse" />
      {Array.from({ length: rows }, (_, row) => (
        <div key={row} data-testid="bill-skeleton-row" className="flex space-x-4">
          {Array.from({ length: columns }, (_, col) => (
            <div
              key={col}
              className="h-4 flex-1 bg-neutral-200 rounded animate-pulse"
              style={{ animationDelay: `${(row * columns + col) * 50}ms` }}
            />
          ))}
        </div>
      ))}
    </div>
  );
}
