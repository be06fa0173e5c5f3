export const Priority = {
  P1: 'P1',
  P2: 'P2',
  P3: 'P3',
  None: '',
} as const;

export type Priority = (typeof Priority)[keyof typeof Priority];

export const PRIORITY_CODES: readonly Priority[] = [Priority.P1, Priority.P2, Priority.P3, Priority.None];

/** Sort rank: lower sorts first, unset last */
export const PriorityRank: Record<Priority, number> = {
  [Priority.P1]: 1,
  [Priority.P2]: 2,
  [Priority.P3]: 3,
  [Priority.None]: 4,
};

export const PriorityName: Record<Priority, string> = {
  [Priority.P1]: 'High',
  [Priority.P2]: 'Medium',
  [Priority.P3]: 'Low',
  [Priority.None]: 'None',
};

export function isPriority(value: unknown): value is Priority {
  return PRIORITY_CODES.some(code => code === value);
}
