import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  deregisterAgent,
  formatAgentAddress,
  listAgents,
  parseAgentAddress,
  registerAgent,
  resolveAgent,
  setAttachmentsPolicy,
  setContactPolicy,
} from '../src/core/agents.js';
import {
  confirmSiblings,
  dismissSiblings,
  ensureProduct,
  ensureProject,
  linkProjectToProduct,
  listProductProjects,
  listProjects,
  listSiblingSuggestions,
  requireProduct,
  suggestSiblings,
} from '../src/core/projects.js';
import { isValidAgentName } from '../src/core/validation.js';
import {
  InvalidTransitionError,
  NotFoundError,
  UnknownAgentError,
  ValidationError,
} from '../src/core/errors.js';
import { createTestStore, type TestStore } from './helpers.js';

describe('registry', () => {
  let store: TestStore;

  beforeEach(() => {
    store = createTestStore('registry');
  });

  afterEach(() => {
    store.cleanup();
  });

  describe('projects', () => {
    it('should derive a slug and be idempotent', () => {
      const first = ensureProject(store.db, '/Users/dev/Backend');
      const second = ensureProject(store.db, '/Users/dev/Backend');

      expect(first.slug).toBe('users-dev-backend');
      expect(first.human_key).toBe('/Users/dev/Backend');
      expect(second.id).toBe(first.id);
      expect(listProjects(store.db)).toHaveLength(1);
    });

    it('should reject keys without a usable slug', () => {
      expect(() => ensureProject(store.db, '///')).toThrow(ValidationError);
    });
  });

  describe('agents', () => {
    beforeEach(() => {
      ensureProject(store.db, '/repo/one');
    });

    it('should register with defaults', () => {
      const agent = registerAgent(store.db, {
        project: 'repo-one',
        name: 'BlueLake',
        program: 'codex-cli',
        model: 'test-model',
        taskDescription: 'auth refactor',
      });

      expect(agent.name).toBe('BlueLake');
      expect(agent.contact_policy).toBe('auto');
      expect(agent.attachments_policy).toBe('auto');
      expect(agent.state).toBe('active');
      expect(agent.task_description).toBe('auth refactor');
      expect(agent.inception_ts).toBe(agent.last_active_ts);
    });

    it('should generate a valid unused name when none is given', () => {
      const agent = registerAgent(store.db, { project: 'repo-one', program: 'codex-cli', model: 'test-model' });

      expect(isValidAgentName(agent.name)).toBe(true);
      expect(resolveAgent(store.db, { project: 'repo-one', name: agent.name }).id).toBe(agent.id);
    });

    it('should update an existing registration in place', () => {
      const first = registerAgent(store.db, { project: 'repo-one', name: 'BlueLake', program: 'a', model: 'm1' });
      const second = registerAgent(store.db, { project: 'repo-one', name: 'BlueLake', program: 'b', model: 'm2' });

      expect(second.id).toBe(first.id);
      expect(second.program).toBe('b');
      expect(second.model).toBe('m2');
    });

    it('should reactivate a deregistered name', () => {
      registerAgent(store.db, { project: 'repo-one', name: 'BlueLake', program: 'a', model: 'm' });
      const gone = deregisterAgent(store.db, { project: 'repo-one', name: 'BlueLake' });
      expect(gone.state).toBe('deregistered');
      expect(listAgents(store.db, 'repo-one')).toEqual([]);
      expect(listAgents(store.db, 'repo-one', true)).toHaveLength(1);

      const back = registerAgent(store.db, { project: 'repo-one', name: 'BlueLake', program: 'a', model: 'm' });
      expect(back.state).toBe('active');
      expect(back.deregistered_ts).toBeNull();
    });

    it('should keep the first deregistration timestamp', () => {
      registerAgent(store.db, { project: 'repo-one', name: 'BlueLake', program: 'a', model: 'm' });
      const first = deregisterAgent(store.db, { project: 'repo-one', name: 'BlueLake' });
      const again = deregisterAgent(store.db, { project: 'repo-one', name: 'BlueLake' });

      expect(again.deregistered_ts).toBe(first.deregistered_ts);
    });

    it('should validate names and policies', () => {
      expect(() => registerAgent(store.db, { project: 'repo-one', name: 'bad name', program: 'a', model: 'm' }))
        .toThrow(ValidationError);
      registerAgent(store.db, { project: 'repo-one', name: 'BlueLake', program: 'a', model: 'm' });
      expect(() => setContactPolicy(store.db, { project: 'repo-one', name: 'BlueLake' }, 'friends'))
        .toThrow(ValidationError);
      expect(setAttachmentsPolicy(store.db, { project: 'repo-one', name: 'BlueLake' }, 'inline').attachments_policy)
        .toBe('inline');
    });

    it('should report unknown projects and agents', () => {
      expect(() => registerAgent(store.db, { project: 'nope', name: 'BlueLake', program: 'a', model: 'm' }))
        .toThrow(NotFoundError);
      expect(() => resolveAgent(store.db, { project: 'repo-one', name: 'Ghost' }))
        .toThrow(UnknownAgentError);
    });
  });

  describe('addresses', () => {
    it('should parse bare and qualified addresses', () => {
      expect(parseAgentAddress('BlueLake')).toEqual({ project: null, name: 'BlueLake' });
      expect(parseAgentAddress('@BlueLake')).toEqual({ project: null, name: 'BlueLake' });
      expect(parseAgentAddress(' BlueLake@backend ')).toEqual({ project: 'backend', name: 'BlueLake' });
    });

    it('should reject malformed addresses', () => {
      expect(() => parseAgentAddress('')).toThrow(ValidationError);
      expect(() => parseAgentAddress('BlueLake@')).toThrow(ValidationError);
      expect(() => parseAgentAddress('Blue Lake@backend')).toThrow(ValidationError);
    });

    it('should format relative to a home project', () => {
      expect(formatAgentAddress('BlueLake', 'backend', 'backend')).toBe('BlueLake');
      expect(formatAgentAddress('BlueLake', 'backend', 'frontend')).toBe('BlueLake@backend');
    });
  });

  describe('products', () => {
    it('should create products with a generated uid and link projects once', () => {
      ensureProject(store.db, '/repo/one');
      ensureProject(store.db, '/repo/two');

      const product = ensureProduct(store.db, 'suite');
      expect(product.product_uid).toMatch(/^prd-[0-9a-z]{8}$/);
      expect(ensureProduct(store.db, 'suite').id).toBe(product.id);

      linkProjectToProduct(store.db, 'suite', 'repo-two');
      linkProjectToProduct(store.db, product.product_uid, 'repo-one');
      linkProjectToProduct(store.db, 'suite', 'repo-two');

      expect(listProductProjects(store.db, 'suite').map(p => p.slug)).toEqual(['repo-one', 'repo-two']);
    });

    it('should report unknown products', () => {
      expect(() => requireProduct(store.db, 'missing')).toThrow(NotFoundError);
    });
  });

  describe('sibling suggestions', () => {
    beforeEach(() => {
      ensureProject(store.db, '/repo/one');
      ensureProject(store.db, '/repo/two');
    });

    it('should store one suggestion per unordered pair', () => {
      const first = suggestSiblings(store.db, 'repo-two', 'repo-one', { score: 0.4, rationale: 'shared client' });
      const refreshed = suggestSiblings(store.db, 'repo-one', 'repo-two', { score: 0.9 });

      expect(first.project_a_id).toBeLessThan(first.project_b_id);
      expect(refreshed.id).toBe(first.id);
      expect(refreshed.score).toBe(0.9);
      expect(listSiblingSuggestions(store.db, 'repo-one')).toHaveLength(1);
    });

    it('should only leave the suggested state once', () => {
      suggestSiblings(store.db, 'repo-one', 'repo-two', { score: 0.5 });

      const confirmed = confirmSiblings(store.db, 'repo-two', 'repo-one');
      expect(confirmed.status).toBe('confirmed');
      expect(confirmed.confirmed_ts).not.toBeNull();

      expect(() => dismissSiblings(store.db, 'repo-one', 'repo-two')).toThrow(InvalidTransitionError);

      const untouched = suggestSiblings(store.db, 'repo-one', 'repo-two', { score: 0.1 });
      expect(untouched.status).toBe('confirmed');
      expect(untouched.score).toBe(0.5);
    });

    it('should reject self pairs and missing suggestions', () => {
      expect(() => suggestSiblings(store.db, 'repo-one', 'repo-one', { score: 1 })).toThrow(ValidationError);
      expect(() => dismissSiblings(store.db, 'repo-one', 'repo-two')).toThrow(NotFoundError);
    });
  });
});
