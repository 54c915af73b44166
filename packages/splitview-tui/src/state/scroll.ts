/**
 * Scroll offsets for the content pane
 */

export type ScrollCommand = 'scrollUp' | 'scrollDown' | 'scrollHome' | 'scrollEnd' | 'pageUp' | 'pageDown';

export interface ScrollMetrics {
  lineCount: number;
  viewportHeight: number;
}

export function maxScrollOffset({ lineCount, viewportHeight }: ScrollMetrics): number {
  return Math.max(0, lineCount - Math.max(viewportHeight, 1));
}

export function pageSize(viewportHeight: number): number {
  return Math.max(viewportHeight - 2, 1);
}

export function applyScroll(offset: number, command: ScrollCommand, metrics: ScrollMetrics): number {
  const max = maxScrollOffset(metrics);
  let next = offset;

  switch (command) {
    case 'scrollDown':
      next = offset + 1;
      break;
    case 'scrollUp':
      next = offset - 1;
      break;
    case 'scrollHome':
      next = 0;
      break;
    case 'scrollEnd':
      next = max;
      break;
    case 'pageDown':
      next = offset + pageSize(metrics.viewportHeight);
      break;
    case 'pageUp':
      next = offset - pageSize(metrics.viewportHeight);
      break;
  }

  return Math.min(Math.max(next, 0), max);
}
