import { describe, it, expect } from 'vitest';
import {
  edgeCategoryOf,
  edgeTypesInCategories,
  toClassification,
  toEdgeType,
  toNodeType,
} from './categories.js';

describe('edge categories', () => {
  it('maps edge types to their category', () => {
    expect(edgeCategoryOf('transform')).toBe('data_flow');
    expect(edgeCategoryOf('column_passes_through')).toBe('column_level');
    expect(edgeCategoryOf('governed_by')).toBe('governance');
    expect(edgeCategoryOf('other')).toBe('other');
  });

  it('expands categories into edge types without duplicates', () => {
    expect(edgeTypesInCategories(['execution'])).toEqual(['executes', 'produces']);
    expect(edgeTypesInCategories(['organizational', 'other', 'organizational'])).toEqual([
      'member_of',
      'reports_to',
      'other',
    ]);
    expect(edgeTypesInCategories([])).toEqual([]);
  });
});

describe('stored value normalisation', () => {
  it('degrades unknown types to other', () => {
    expect(toNodeType('view')).toBe('view');
    expect(toNodeType('hologram')).toBe('other');
    expect(toEdgeType('feeds')).toBe('feeds');
    expect(toEdgeType('teleports')).toBe('other');
  });

  it('drops unknown classifications', () => {
    expect(toClassification('pii')).toBe('pii');
    expect(toClassification('top-secret')).toBeNull();
    expect(toClassification(null)).toBeNull();
  });
});
