/**
 * @jest-environment jsdom
 */

import React from 'react';
import { render, screen, within } from '@testing-library/react';
import BillTable from '@/components/BillTable';
import useMediaQuery from '@/hooks/useMediaQuery';
import { bill, hostBill } from '@/__tests__/fixtures/bills';

jest.mock('@/hooks/useMediaQuery', () => ({
  __esModule: true,
  default: jest.fn(() => false),
}));

const mockUseMediaQuery = jest.mocked(useMediaQuery);

describe('BillTable', () => {
  beforeEach(() => {
    mockUseMediaQuery.mockReturnValue(false);
  });

  it('should show an empty state without bills', () => {
    render(<BillTable bills={[]} />);

    expect(screen.getByText('Bills')).toBeInTheDocument();
    expect(screen.getByText('No billable period yet.')).toBeInTheDocument();
  });

  it('should render one row per bill', () => {
    render(<BillTable bills={[hostBill(), bill()]} title="January bills" />);

    expect(screen.getByText('January bills')).toBeInTheDocument();
    const rows = screen.getAllByRole('row');
    // header, two bills, footer
    expect(rows).toHaveLength(4);
    expect(within(rows[2]).getByText('Tobias Amstutz')).toBeInTheDocument();
    expect(within(rows[2]).getByText('60.000 kWh')).toBeInTheDocument();
    expect(within(rows[2]).getByText('40.000 kWh')).toBeInTheDocument();
  });

  it('should show the net total', () => {
    render(<BillTable bills={[hostBill(), bill()]} />);

    expect(screen.getByTestId('net-total')).toHaveTextContent('CHF 8.00');
  });

  it('should badge host and producer', () => {
    render(<BillTable bills={[hostBill(), bill()]} />);

    expect(screen.getByText('Host')).toBeInTheDocument();
    expect(screen.getByText('Producer')).toBeInTheDocument();
    expect(screen.getByText('CHF -16.00')).toBeInTheDocument();
  });

  it('should render cards on mobile', () => {
    mockUseMediaQuery.mockReturnValue(true);

    render(<BillTable bills={[hostBill(), bill()]} />);

    expect(screen.getAllByTestId('bill-card')).toHaveLength(2);
    expect(screen.queryByRole('table')).not.toBeInTheDocument();
    expect(screen.getByText('CHF 24.00')).toBeInTheDocument();
  });
});
