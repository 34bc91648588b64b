import type { Result } from '../src/errors.js';
import { buildKnowledgeBase, loadKnowledge, type KnowledgeBase, type KnowledgeFile } from '../src/reasoner/knowledge.js';

export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) throw new Error(`expected ok, got ${result.error.kind}: ${result.error.message}`);
  return result.value;
}

export function errorOf<T>(result: Result<T>) {
  if (result.ok) throw new Error('expected a failure');
  return result.error;
}

export function realKnowledge(): KnowledgeBase {
  return unwrap(loadKnowledge());
}

export function fixtureKnowledge(file: KnowledgeFile): KnowledgeBase {
  return unwrap(buildKnowledgeBase(file));
}
