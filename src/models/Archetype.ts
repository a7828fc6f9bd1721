/**
 * Archetype axes and letters.
 *
 * Four independent behavioral axes, each resolved to one of two letters.
 * The code is always written in AXIS_ORDER.
 */

export type AxisName = 'mentality' | 'workEthic' | 'presence' | 'temperament';

export const AXIS_ORDER: readonly AxisName[] = ['mentality', 'workEthic', 'presence', 'temperament'];

export interface AxisDefinition {
  axis: AxisName;
  label: string;
  highLetter: string;
  highLabel: string;
  lowLetter: string;
  lowLabel: string;
}

export const AXIS_DEFINITIONS: Readonly<Record<AxisName, AxisDefinition>> = {
  mentality:   { axis: 'mentality',   label: 'Mentality',   highLetter: 'S', highLabel: 'Scorer',     lowLetter: 'F', lowLabel: 'Facilitator' },
  workEthic:   { axis: 'workEthic',   label: 'Work Ethic',  highLetter: 'W', highLabel: 'Warrior',    lowLetter: 'P', lowLabel: 'Specialist' },
  presence:    { axis: 'presence',    label: 'Presence',    highLetter: 'I', highLabel: 'Involved',   lowLetter: 'C', lowLabel: 'Clinical' },
  temperament: { axis: 'temperament', label: 'Temperament', highLetter: 'N', highLabel: 'Intense',    lowLetter: 'O', lowLabel: 'Composed' },
};

/** Letter used for an axis that could not be scored */
export const INDETERMINATE_LETTER = '?';

export type DataSufficiency = 'complete' | 'partial';

export function isAxisName(value: string): value is AxisName {
  return AXIS_ORDER.some(axis => axis === value);
}
