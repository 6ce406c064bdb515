/**
 * @jest-environment jsdom
 */

import { renderHook, act } from '@testing-library/react';
import useMediaQuery from '@/hooks/useMediaQuery';

type ChangeListener = (event: MediaQueryListEvent) => void;

describe('useMediaQuery', () => {
  const originalMatchMedia = window.matchMedia;
  let listeners: ChangeListener[];
  let removeEventListener: jest.Mock;

  function mockMatchMedia(matches: (query: string) => boolean) {
    window.matchMedia = jest.fn().mockImplementation((query: string) => ({
      matches: matches(query),
      media: query,
      onchange: null,
      addListener: jest.fn(),
      removeListener: jest.fn(),
      addEventListener: jest.fn((type: string, listener: ChangeListener) => {
        if (type === 'change') listeners.push(listener);
      }),
      removeEventListener,
      dispatchEvent: jest.fn(),
    }));
  }

  beforeEach(() => {
    listeners = [];
    removeEventListener = jest.fn();
    mockMatchMedia(() => false);
  });

  afterEach(() => {
    window.matchMedia = originalMatchMedia;
  });

  it('should be false when the query does not match', () => {
    const { result } = renderHook(() => useMediaQuery('(max-width: 768px)'));

    expect(result.current).toBe(false);
  });

  it('should only match the queried breakpoint', () => {
    mockMatchMedia((query) => query === '(max-width: 640px)');

    expect(renderHook(() => useMediaQuery('(max-width: 640px)')).result.current).toBe(true);
    expect(renderHook(() => useMediaQuery('(max-width: 768px)')).result.current).toBe(false);
  });

  it('should follow change events', () => {
    const { result } = renderHook(() => useMediaQuery('(max-width: 768px)'));

    act(() => {
      const event = Object.assign(new Event('change'), { matches: true, media: '(max-width: 768px)' });
      listeners.forEach((listener) => listener(event));
    });

    expect(result.current).toBe(true);
  });

  it('should stop listening on unmount', () => {
    const { unmount } = renderHook(() => useMediaQuery('(max-width: 768px)'));
    unmount();

    expect(removeEventListener).toHaveBeenCalledWith('change', listeners[0]);
  });
});
