import type Database from 'better-sqlite3';
import { uniqueNamesGenerator, adjectives, animals } from 'unique-names-generator';
import type { Agent, AgentAddress, AgentRef, AttachmentsPolicy, ContactPolicy } from '../types.js';
import {
  createAgent,
  getAgentById,
  getAgentByName,
  getAgentsByProject,
  getProjectBySlug,
  touchAgent,
  updateAgent,
} from '../db/queries.js';
import { InactiveAgentError, UnknownAgentError, ValidationError } from './errors.js';
import { requireProject } from './projects.js';
import { now } from './time.js';
import { writeTransaction } from './store.js';
import {
  assertAgentName,
  assertMaxLength,
  parseAttachmentsPolicy,
  parseContactPolicy,
} from './validation.js';

export interface RegisterAgentInput {
  project: string;            // project slug
  name?: string;              // generated when omitted
  program: string;
  model: string;
  taskDescription?: string;
  contactPolicy?: ContactPolicy;
  attachmentsPolicy?: AttachmentsPolicy;
}

/**
 * Generate a random agent name like "GreenCastle" or "SwiftOtter".
 */
export function generateAgentName(): string {
  return uniqueNamesGenerator({
    dictionaries: [adjectives, animals],
    separator: '',
    length: 2,
    style: 'capital',
  });
}

/**
 * Generate a name not yet used in the project.
 */
function generateUniqueName(db: Database.Database, projectId: number, maxAttempts = 10): string {
  for (let i = 0; i < maxAttempts; i++) {
    const name = generateAgentName();
    if (isUsableGeneratedName(name) && !getAgentByName(db, projectId, name)) {
      return name;
    }
  }
  // Fallback: add numeric suffix
  return `${generateAgentName()}${Date.now() % 10000}`;
}

function isUsableGeneratedName(name: string): boolean {
  // Dictionary words occasionally carry characters outside the name alphabet
  return /^[A-Za-z0-9]+$/.test(name);
}

/**
 * Parse an address into name and optional project slug.
 * @example parseAgentAddress("BlueLake") -> { project: null, name: "BlueLake" }
 * @example parseAgentAddress("BlueLake@backend") -> { project: "backend", name: "BlueLake" }
 * @throws ValidationError if the address is empty or malformed
 */
export function parseAgentAddress(address: string): AgentAddress {
  const trimmed = address.trim().replace(/^@/, '');
  const at = trimmed.indexOf('@');
  const name = at === -1 ? trimmed : trimmed.slice(0, at);
  const project = at === -1 ? null : trimmed.slice(at + 1);

  if (name.length === 0 || project === '') {
    throw new ValidationError(`Invalid agent address: ${address}`, 'INVALID_ADDRESS');
  }
  assertAgentName(name);
  return { project, name };
}

/**
 * Format an agent address relative to a home project.
 */
export function formatAgentAddress(name: string, projectSlug: string, homeSlug?: string): string {
  return homeSlug === projectSlug ? name : `${name}@${projectSlug}`;
}

/**
 * Resolve an agent by project slug and name, active or not.
 * @throws UnknownAgentError if either does not resolve
 */
export function resolveAgent(db: Database.Database, ref: AgentRef): Agent {
  const project = getProjectBySlug(db, ref.project);
  const agent = project ? getAgentByName(db, project.id, ref.name) : undefined;
  if (!agent) {
    throw new UnknownAgentError(`${ref.name}@${ref.project}`);
  }
  return agent;
}

/**
 * Resolve an agent that must be able to act (not deregistered).
 * @throws UnknownAgentError, InactiveAgentError
 */
export function resolveActiveAgent(db: Database.Database, ref: AgentRef): Agent {
  const agent = resolveAgent(db, ref);
  if (agent.state === 'deregistered') {
    throw new InactiveAgentError(`${ref.name}@${ref.project}`);
  }
  return agent;
}

export function requireAgentById(db: Database.Database, agentId: number): Agent {
  const agent = getAgentById(db, agentId);
  if (!agent) {
    throw new UnknownAgentError(`#${agentId}`);
  }
  return agent;
}

/**
 * Register an agent in a project, or refresh an existing registration.
 * Re-registering a deregistered name reactivates it.
 */
export function registerAgent(db: Database.Database, input: RegisterAgentInput): Agent {
  if (input.name !== undefined) {
    assertAgentName(input.name);
  }
  assertMaxLength('program', input.program, 128);
  assertMaxLength('model', input.model, 128);
  assertMaxLength('task_description', input.taskDescription ?? '', 2048);
  const contactPolicy = input.contactPolicy !== undefined
    ? parseContactPolicy(input.contactPolicy)
    : undefined;
  const attachmentsPolicy = input.attachmentsPolicy !== undefined
    ? parseAttachmentsPolicy(input.attachmentsPolicy)
    : undefined;

  return writeTransaction(db, () => {
    const project = requireProject(db, input.project);
    const ts = now();
    const name = input.name ?? generateUniqueName(db, project.id);
    const existing = getAgentByName(db, project.id, name);

    if (existing) {
      updateAgent(db, existing.id, {
        program: input.program,
        model: input.model,
        task_description: input.taskDescription,
        contact_policy: contactPolicy,
        attachments_policy: attachmentsPolicy,
        last_active_ts: ts,
        deregistered_ts: null,
      });
      return requireAgentById(db, existing.id);
    }

    return createAgent(db, {
      project_id: project.id,
      name,
      program: input.program,
      model: input.model,
      task_description: input.taskDescription ?? '',
      inception_ts: ts,
      last_active_ts: ts,
      attachments_policy: attachmentsPolicy ?? 'auto',
      contact_policy: contactPolicy ?? 'auto',
      deregistered_ts: null,
    });
  });
}

/**
 * Soft-delete an agent. History stays queryable; it can no longer receive
 * messages or take reservations.
 * @returns the agent with deregistered_ts set (unchanged if already deregistered)
 */
export function deregisterAgent(db: Database.Database, ref: AgentRef): Agent {
  return writeTransaction(db, () => {
    const agent = resolveAgent(db, ref);
    if (agent.state === 'deregistered') {
      return agent;
    }
    const ts = now();
    updateAgent(db, agent.id, { deregistered_ts: ts, last_active_ts: ts });
    return requireAgentById(db, agent.id);
  });
}

export function setContactPolicy(db: Database.Database, ref: AgentRef, policy: string): Agent {
  const contactPolicy = parseContactPolicy(policy);
  return writeTransaction(db, () => {
    const agent = resolveActiveAgent(db, ref);
    updateAgent(db, agent.id, { contact_policy: contactPolicy, last_active_ts: now() });
    return requireAgentById(db, agent.id);
  });
}

export function setAttachmentsPolicy(db: Database.Database, ref: AgentRef, policy: string): Agent {
  const attachmentsPolicy = parseAttachmentsPolicy(policy);
  return writeTransaction(db, () => {
    const agent = resolveActiveAgent(db, ref);
    updateAgent(db, agent.id, { attachments_policy: attachmentsPolicy, last_active_ts: now() });
    return requireAgentById(db, agent.id);
  });
}

/**
 * Record activity for an agent (any action updates last_active_ts).
 */
export function recordActivity(db: Database.Database, agent: Agent, ts = now()): void {
  touchAgent(db, agent.id, ts);
}

/**
 * List agents of a project.
 */
export function listAgents(
  db: Database.Database,
  projectSlug: string,
  includeDeregistered = false
): Agent[] {
  const project = requireProject(db, projectSlug);
  return getAgentsByProject(db, project.id, includeDeregistered);
}
