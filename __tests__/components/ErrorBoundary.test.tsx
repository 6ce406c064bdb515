/**
 * @jest-environment jsdom
 */

import React from 'react';
import { render, screen, fireEvent } from '@testing-library/react';
import { ErrorBoundary } from '@/components/ErrorBoundary';

let shouldThrow = true;

const Bills = () => {
  if (shouldThrow) {
    throw new Error('Bill has no period');
  }
  return <div>Bills loaded</div>;
};

describe('ErrorBoundary', () => {
  beforeEach(() => {
    shouldThrow = true;
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should render children when nothing throws', () => {
    render(
      <ErrorBoundary>
        <div>Test content</div>
      </ErrorBoundary>
    );

    expect(screen.getByText('Test content')).toBeInTheDocument();
  });

  it('should render the error screen when a child throws', () => {
    render(
      <ErrorBoundary>
        <Bills />
      </ErrorBoundary>
    );

    expect(screen.getByText('Billing overview unavailable')).toBeInTheDocument();
    expect(screen.getByText(/Bills already issued are not affected/)).toBeInTheDocument();
    expect(screen.getByText('Bill has no period')).toBeInTheDocument();
  });

  it('should render a custom fallback', () => {
    render(
      <ErrorBoundary fallback={<div>Custom error message</div>}>
        <Bills />
      </ErrorBoundary>
    );

    expect(screen.getByText('Custom error message')).toBeInTheDocument();
    expect(screen.queryByText('Billing overview unavailable')).not.toBeInTheDocument();
  });

  it('should render the children again after "Try again"', () => {
    render(
      <ErrorBoundary>
        <Bills />
      </ErrorBoundary>
    );

    shouldThrow = false;
    fireEvent.click(screen.getByText('Try again'));

    expect(screen.getByText('Bills loaded')).toBeInTheDocument();
  });

  it('should log the error', () => {
    render(
      <ErrorBoundary>
        <Bills />
      </ErrorBoundary>
    );

    expect(console.error).toHaveBeenCalledWith(
      'Billing overview failed to render:',
      expect.any(Error),
      expect.objectContaining({ componentStack: expect.any(String) })
    );
  });
});
