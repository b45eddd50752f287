import type Database from 'better-sqlite3';
import type { Product, Project, ProjectSiblingSuggestion } from '../types.js';
import {
  createProduct,
  createProject,
  createSiblingSuggestion,
  getAllProjects,
  getProductByName,
  getProductByUid,
  getProductProjects,
  getProjectBySlug,
  getSiblingSuggestion,
  getSiblingSuggestionsForProject,
  linkProductProject,
  updateSiblingEvaluation,
  updateSiblingStatus,
} from '../db/queries.js';
import { generateGuid, slugify } from './guid.js';
import { InvalidTransitionError, NotFoundError, ValidationError } from './errors.js';
import { now } from './time.js';
import { writeTransaction } from './store.js';

/**
 * Get or create the project for a human key (usually a repository path).
 * Idempotent: the same key always maps to the same slug and row.
 */
export function ensureProject(db: Database.Database, humanKey: string): Project {
  const slug = slugify(humanKey);
  if (slug.length === 0) {
    throw new ValidationError(`Cannot derive a project slug from: ${humanKey}`, 'INVALID_PROJECT_KEY');
  }

  return writeTransaction(db, () => {
    const existing = getProjectBySlug(db, slug);
    if (existing) return existing;
    return createProject(db, { slug, human_key: humanKey.trim(), created_at: now() });
  });
}

/**
 * Resolve a project slug.
 * @throws NotFoundError if missing
 */
export function requireProject(db: Database.Database, slug: string): Project {
  const project = getProjectBySlug(db, slug);
  if (!project) {
    throw new NotFoundError(`Project not found: ${slug}`, 'PROJECT_NOT_FOUND', { project: slug });
  }
  return project;
}

export function listProjects(db: Database.Database): Project[] {
  return getAllProjects(db);
}

/**
 * Get or create a product by name.
 */
export function ensureProduct(db: Database.Database, name: string): Product {
  const trimmed = name.trim();
  if (trimmed.length === 0 || trimmed.length > 255) {
    throw new ValidationError(`Invalid product name: ${name}`, 'INVALID_PRODUCT_NAME');
  }

  return writeTransaction(db, () => {
    const existing = getProductByName(db, trimmed);
    if (existing) return existing;

    let uid = generateGuid('prd');
    while (getProductByUid(db, uid)) {
      uid = generateGuid('prd');
    }
    return createProduct(db, { product_uid: uid, name: trimmed, created_at: now() });
  });
}

/**
 * Resolve a product by name or uid.
 * @throws NotFoundError if neither matches
 */
export function requireProduct(db: Database.Database, ref: string): Product {
  const product = getProductByName(db, ref) ?? getProductByUid(db, ref);
  if (!product) {
    throw new NotFoundError(`Product not found: ${ref}`, 'PRODUCT_NOT_FOUND', { product: ref });
  }
  return product;
}

/**
 * Add a project to a product. Linking twice is a no-op.
 */
export function linkProjectToProduct(
  db: Database.Database,
  productRef: string,
  projectSlug: string
): Project[] {
  return writeTransaction(db, () => {
    const product = requireProduct(db, productRef);
    const project = requireProject(db, projectSlug);
    linkProductProject(db, product.id, project.id, now());
    return getProductProjects(db, product.id);
  });
}

export function listProductProjects(db: Database.Database, productRef: string): Project[] {
  return getProductProjects(db, requireProduct(db, productRef).id);
}

/**
 * Order a pair so the lower id comes first.
 */
function orderPair(a: Project, b: Project): [Project, Project] {
  return a.id < b.id ? [a, b] : [b, a];
}

/**
 * Record or refresh a sibling suggestion for an unordered project pair.
 * Score and rationale are only refreshed while the pair is still 'suggested';
 * a confirmed or dismissed pair is returned untouched.
 */
export function suggestSiblings(
  db: Database.Database,
  projectA: string,
  projectB: string,
  evaluation: { score: number; rationale?: string }
): ProjectSiblingSuggestion {
  if (!Number.isFinite(evaluation.score)) {
    throw new ValidationError(`Invalid score: ${evaluation.score}`, 'INVALID_SCORE');
  }

  return writeTransaction(db, () => {
    const [first, second] = orderPair(requireProject(db, projectA), requireProject(db, projectB));
    if (first.id === second.id) {
      throw new ValidationError('A project cannot be its own sibling', 'INVALID_SIBLING_PAIR');
    }

    const ts = now();
    const rationale = evaluation.rationale ?? '';
    const existing = getSiblingSuggestion(db, first.id, second.id);
    if (existing) {
      if (existing.status !== 'suggested') return existing;
      updateSiblingEvaluation(db, existing.id, evaluation.score, rationale, ts);
      return { ...existing, score: evaluation.score, rationale, evaluated_ts: ts };
    }

    return createSiblingSuggestion(db, {
      project_a_id: first.id,
      project_b_id: second.id,
      score: evaluation.score,
      status: 'suggested',
      rationale,
      created_ts: ts,
      evaluated_ts: ts,
      confirmed_ts: null,
      dismissed_ts: null,
    });
  });
}

function decideSiblings(
  db: Database.Database,
  projectA: string,
  projectB: string,
  status: 'confirmed' | 'dismissed'
): ProjectSiblingSuggestion {
  return writeTransaction(db, () => {
    const [first, second] = orderPair(requireProject(db, projectA), requireProject(db, projectB));
    const existing = getSiblingSuggestion(db, first.id, second.id);
    if (!existing) {
      throw new NotFoundError(
        `No sibling suggestion for ${first.slug} and ${second.slug}`,
        'SIBLING_SUGGESTION_NOT_FOUND'
      );
    }
    if (existing.status !== 'suggested') {
      throw new InvalidTransitionError('sibling suggestion', existing.status, status);
    }

    const ts = now();
    updateSiblingStatus(db, existing.id, status, ts);
    return status === 'confirmed'
      ? { ...existing, status, confirmed_ts: ts }
      : { ...existing, status, dismissed_ts: ts };
  });
}

export function confirmSiblings(db: Database.Database, projectA: string, projectB: string): ProjectSiblingSuggestion {
  return decideSiblings(db, projectA, projectB, 'confirmed');
}

export function dismissSiblings(db: Database.Database, projectA: string, projectB: string): ProjectSiblingSuggestion {
  return decideSiblings(db, projectA, projectB, 'dismissed');
}

export function listSiblingSuggestions(db: Database.Database, projectSlug: string): ProjectSiblingSuggestion[] {
  return getSiblingSuggestionsForProject(db, requireProject(db, projectSlug).id);
}
