export const HEADER_HEIGHT = 1;
export const STATUS_BAR_HEIGHT = 3;
const PANE_BORDER = 2;
const CONTENT_PADDING_X = 2;

export interface LayoutInput {
  columns?: number;
  rows?: number;
  sidebarPercent: number;
  sidebarVisible: boolean;
}

export interface Layout {
  columns: number;
  rows: number;
  bodyHeight: number;
  sidebarWidth: number;
  contentWidth: number;
  treeRows: number;
  viewportHeight: number;
  textWidth: number;
}

export function computeLayout({ columns, rows, sidebarPercent, sidebarVisible }: LayoutInput): Layout {
  const width = columns || 80;
  const height = rows || 24;

  const bodyHeight = Math.max(height - HEADER_HEIGHT - STATUS_BAR_HEIGHT, 3);
  const sidebarWidth = sidebarVisible ? Math.floor((width * sidebarPercent) / 100) : 0;
  const contentWidth = width - sidebarWidth;

  return {
    columns: width,
    rows: height,
    bodyHeight,
    sidebarWidth,
    contentWidth,
    treeRows: Math.max(bodyHeight - PANE_BORDER, 1),
    // one line for the pane title
    viewportHeight: Math.max(bodyHeight - PANE_BORDER - 1, 1),
    textWidth: Math.max(contentWidth - PANE_BORDER - CONTENT_PADDING_X * 2, 10)
  };
}
