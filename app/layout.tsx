import type { Metadata } from 'next';
import type { ReactNode } from 'react';
import ErrorBoundary from '@/components/ErrorBoundary';
import { Providers } from '@/components/providers';

export const metadata: Metadata = {
  title: 'Solar Collective Billing',
  description: 'Shared solar allocation and periodic member bills for a self-consumption collective',
};

export default function RootLayout({ children }: { children: ReactNode }) {
  return (
    <html lang="en">
      <body className="antialiased bg-neutral-50 text-neutral-900">
        <Providers>
          <ErrorBoundary>{children}</ErrorBoundary>
        </Providers>
      </body>
    </html>
  );
}
