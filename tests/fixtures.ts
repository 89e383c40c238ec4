import type { ValidationResult } from '../src/types/index.js';

export const sampleResults: ValidationResult[] = [
  {
    root_key: 'k1',
    root_name: 'Wheels',
    current_parent: { parent_key: 'p-veh', parent_name: 'Vehicles', similarity_score: 0.75 },
    suggested_parents: [
      { parent_key: 'p-parts', parent_name: 'Parts', similarity_score: 1, improvement: 0.25 },
    ],
    validation: 'VALID',
    validation_status: 'PASS',
  },
  {
    root_key: 'k2',
    root_name: 'Brakes',
    current_parent: { parent_key: 'p-food', parent_name: 'Food', similarity_score: 0.25 },
    suggested_parents: [
      { parent_key: 'p-parts', parent_name: 'Parts', similarity_score: 1, improvement: 0.75 },
      { parent_key: 'p-veh', parent_name: 'Vehicles', similarity_score: 0.75, improvement: 0.5 },
    ],
    validation: 'INVALID',
    validation_status: 'FAIL',
  },
  {
    root_key: 'k3',
    root_name: 'Tyres, "winter"',
    current_parent: { parent_key: 'p-parts', parent_name: 'Parts', similarity_score: 0.5 },
    suggested_parents: [],
    validation: 'INVALID',
    validation_status: 'FAIL',
  },
];
