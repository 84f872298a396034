import type { ScopedRules } from './types';

export const POSITION_STATUS_RULES: ScopedRules = {
  container: 'PositionStatus',
  fields: [
    { field: 'Code', sentinel: '6A' },
    { field: 'Description', sentinel: 'Ouvriers' }
  ]
};
