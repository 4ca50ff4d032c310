export const DueWindow = {
  Overdue: 'overdue',
  Today: 'today',
  Upcoming: 'upcoming',
  /** Tasks without a due date */
  None: 'none',
} as const;

export type DueWindow = (typeof DueWindow)[keyof typeof DueWindow];

export const DUE_WINDOWS: readonly DueWindow[] = [
  DueWindow.Overdue,
  DueWindow.Today,
  DueWindow.Upcoming,
  DueWindow.None,
];

export function isDueWindow(value: string): value is DueWindow {
  return DUE_WINDOWS.some(w => w === value);
}
