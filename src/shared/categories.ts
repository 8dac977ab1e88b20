/**
 * Node/edge category helpers
 * Unknown stored values degrade to 'other' instead of failing.
 */

import {
  KNOWN_NODE_TYPES,
  KNOWN_EDGE_TYPES,
  EDGE_CATEGORIES,
  EDGE_TYPE_CATEGORIES,
  CLASSIFICATIONS,
  type NodeType,
  type KnownNodeType,
  type EdgeType,
  type KnownEdgeType,
  type EdgeCategory,
  type Classification,
} from './types.js';

const knownNodeTypes: ReadonlySet<string> = new Set<string>(KNOWN_NODE_TYPES);
const knownEdgeTypes: ReadonlySet<string> = new Set<string>(KNOWN_EDGE_TYPES);
const knownClassifications: ReadonlySet<string> = new Set<string>(CLASSIFICATIONS);

const categoryByEdgeType = new Map<string, EdgeCategory>();
for (const category of EDGE_CATEGORIES) {
  for (const type of EDGE_TYPE_CATEGORIES[category]) {
    categoryByEdgeType.set(type, category);
  }
}

export function isKnownNodeType(raw: string): raw is KnownNodeType {
  return knownNodeTypes.has(raw);
}

export function isKnownEdgeType(raw: string): raw is KnownEdgeType {
  return knownEdgeTypes.has(raw);
}

export function isEdgeType(raw: string): raw is EdgeType {
  return raw === 'other' || knownEdgeTypes.has(raw);
}

export function isClassification(raw: string): raw is Classification {
  return knownClassifications.has(raw);
}

export function toNodeType(raw: string): NodeType {
  return isKnownNodeType(raw) ? raw : 'other';
}

export function toEdgeType(raw: string): EdgeType {
  return isKnownEdgeType(raw) ? raw : 'other';
}

export function toClassification(raw: string | null): Classification | null {
  if (raw === null) return null;
  return isClassification(raw) ? raw : null;
}

export function edgeCategoryOf(type: EdgeType): EdgeCategory {
  return categoryByEdgeType.get(type) ?? 'other';
}

/** Expand category names into the edge types they contain */
export function edgeTypesInCategories(categories: EdgeCategory[]): EdgeType[] {
  const result: EdgeType[] = [];
  for (const category of categories) {
    if (category === 'other') {
      result.push('other');
      continue;
    }
    result.push(...EDGE_TYPE_CATEGORIES[category]);
  }
  return [...new Set(result)];
}
