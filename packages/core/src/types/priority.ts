export const Priority = {
  Low: 'low',
  Medium: 'medium',
  High: 'high',
} as const;

export type Priority = (typeof Priority)[keyof typeof Priority];

export const PriorityName: Record<Priority, string> = {
  [Priority.Low]: 'Low',
  [Priority.Medium]: 'Medium',
  [Priority.High]: 'High',
};

/** Least to most urgent */
export const PRIORITIES: readonly Priority[] = [Priority.Low, Priority.Medium, Priority.High];

export function isPriority(value: string): value is Priority {
  return PRIORITIES.some(p => p === value);
}
