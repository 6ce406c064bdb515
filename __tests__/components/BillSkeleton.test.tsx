/**
 * @jest-environment jsdom
 */

import React from 'react';
import { render, screen } from '@testing-library/react';
import BillSkeleton from '@/components/BillSkeleton';

describe('BillSkeleton', () => {
  it('should announce loading', () => {
    render(<BillSkeleton />);

    expect(screen.getByRole('status')).toHaveAttribute('aria-label', 'Loading bills');
  });

  it('should render four rows by default', () => {
    render(<BillSkeleton />);

    expect(screen.getAllByTestId('bill-skeleton-row')).toHaveLength(4);
  });

  it('should honour the row and column count', () => {
    render(<BillSkeleton rows={2} columns={3} />);

    const rows = screen.getAllByTestId('bill-skeleton-row');
    expect(rows).toHaveLength(2);
    expect(rows[0].children).toHaveLength(3);
  });
});
