import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  fetchInbox,
  fetchOutbox,
  fetchProductInbox,
  getMessage,
  getRecipients,
  getThread,
  markAck,
  markRead,
  pruneMessages,
  reply,
  send,
} from '../src/core/messages.js';
import { deregisterAgent, setContactPolicy } from '../src/core/agents.js';
import { approveLink, requestLink } from '../src/core/links.js';
import { ensureProduct, linkProjectToProduct } from '../src/core/projects.js';
import {
  DeliveryDeniedError,
  InactiveAgentError,
  NotFoundError,
  NotRecipientError,
  UnknownAgentError,
  ValidationError,
} from '../src/core/errors.js';
import type { Attachment } from '../src/types.js';
import { addAgent, createTestStore, type TestStore } from './helpers.js';

const P1 = 'repo-one';
const alice = { project: P1, name: 'alice' };
const bob = { project: P1, name: 'bob' };
const erin = { project: P1, name: 'erin' };
const carol = { project: 'repo-two', name: 'carol' };
const dave = { project: 'repo-two', name: 'dave' };

describe('message dispatcher', () => {
  let store: TestStore;

  beforeEach(() => {
    store = createTestStore('messages');
    addAgent(store.db, '/repo/one', 'alice');
    addAgent(store.db, '/repo/one', 'bob');
    addAgent(store.db, '/repo/one', 'erin');
    addAgent(store.db, '/repo/two', 'carol', 'contacts_only');
    addAgent(store.db, '/repo/two', 'dave', 'block_all');
  });

  afterEach(() => {
    vi.useRealTimers();
    store.cleanup();
  });

  describe('send', () => {
    it('should deliver to contacts_only recipients only after link approval', () => {
      const attempt = () => send(store.db, {
        project: P1,
        sender: 'alice',
        to: ['carol@repo-two'],
        subject: 'API change',
        body: 'The auth endpoint moves to v2.',
      });

      expect(attempt).toThrow(DeliveryDeniedError);
      expect(fetchOutbox(store.db, alice)).toEqual([]);
      expect(fetchInbox(store.db, carol)).toEqual([]);

      const link = requestLink(store.db, { from: alice, to: carol, reason: 'auth migration' });
      approveLink(store.db, link.id, carol);

      const message = attempt();

      expect(message.recipients).toHaveLength(1);
      expect(message.recipients[0].agent_name).toBe('carol');
      expect(message.recipients[0].kind).toBe('to');
      expect(fetchInbox(store.db, carol).map(m => m.id)).toEqual([message.id]);
    });

    it('should fail atomically and name every denied recipient', () => {
      let error: unknown;
      try {
        send(store.db, {
          project: P1,
          sender: 'alice',
          to: ['bob', 'carol@repo-two'],
          cc: ['dave@repo-two'],
          subject: 'Heads up',
          body: 'Deploy at noon.',
        });
      } catch (e) {
        error = e;
      }

      expect(error).toBeInstanceOf(DeliveryDeniedError);
      if (!(error instanceof DeliveryDeniedError)) return;
      expect(error.denied).toEqual([
        { recipient: 'carol@repo-two', reason: 'no contact path' },
        { recipient: 'dave@repo-two', reason: 'recipient blocks all contact' },
      ]);
      expect(error.code).toBe('DELIVERY_DENIED');
      expect(fetchInbox(store.db, bob)).toEqual([]);
    });

    it('should start a new thread rooted at the message id', () => {
      const message = send(store.db, { project: P1, sender: 'alice', to: ['bob'], subject: 'Hello', body: 'Hi' });

      expect(message.thread_id).toBe(String(message.id));
      expect(getMessage(store.db, message.id)?.thread_id).toBe(String(message.id));
    });

    it('should keep a caller-supplied thread id', () => {
      const message = send(store.db, {
        project: P1,
        sender: 'alice',
        to: ['bob'],
        subject: 'Status',
        body: 'Done',
        threadId: 'feat-123',
      });

      expect(message.thread_id).toBe('feat-123');
    });

    it('should collapse duplicate recipients with to winning over cc', () => {
      const message = send(store.db, {
        project: P1,
        sender: 'alice',
        to: ['bob'],
        cc: ['@bob', 'erin', 'erin@repo-one'],
        subject: 'Review',
        body: 'Please look',
      });

      expect(message.recipients.map(r => [r.agent_name, r.kind])).toEqual([
        ['bob', 'to'],
        ['erin', 'cc'],
      ]);
    });

    it('should store defaults and attachments', () => {
      const attachments: Attachment[] = [
        { kind: 'file', id: 'a1', path: 'docs/plan.md', media_type: 'text/markdown', bytes: 120 },
        { kind: 'link', id: 'a2', url: 'https://example.com/design' },
      ];

      const message = send(store.db, {
        project: P1,
        sender: 'alice',
        to: ['bob'],
        subject: '  Plan  ',
        body: 'See attached',
        importance: 'high',
        ackRequired: true,
        attachments,
      });

      const stored = getMessage(store.db, message.id);
      expect(stored?.subject).toBe('Plan');
      expect(stored?.importance).toBe('high');
      expect(stored?.ack_required).toBe(true);
      expect(stored?.attachments).toEqual(attachments);
    });

    it('should reject invalid input', () => {
      const base = { project: P1, sender: 'alice', to: ['bob'], subject: 'Hi', body: 'x' };

      expect(() => send(store.db, { ...base, to: [] })).toThrow(ValidationError);
      expect(() => send(store.db, { ...base, subject: '   ' })).toThrow(ValidationError);
      expect(() => send(store.db, { ...base, threadId: 't'.repeat(129) })).toThrow(ValidationError);
      expect(() => send(store.db, {
        ...base,
        attachments: [{ kind: 'link', id: 'a1', url: 'not a url' }],
      })).toThrow(ValidationError);
      expect(fetchInbox(store.db, bob)).toEqual([]);
    });

    it('should reject unknown recipients', () => {
      expect(() => send(store.db, { project: P1, sender: 'alice', to: ['zed'], subject: 'Hi', body: 'x' }))
        .toThrow('Agent not found: zed@repo-one');
      expect(() => send(store.db, { project: P1, sender: 'alice', to: ['zed'], subject: 'Hi', body: 'x' }))
        .toThrow(UnknownAgentError);
    });

    it('should reject a deregistered sender', () => {
      deregisterAgent(store.db, alice);

      expect(() => send(store.db, { project: P1, sender: 'alice', to: ['bob'], subject: 'Hi', body: 'x' }))
        .toThrow(InactiveAgentError);
    });
  });

  describe('markRead and markAck', () => {
    it('should set the read timestamp once', () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2026-06-01T08:00:00.000Z'));
      const message = send(store.db, { project: P1, sender: 'alice', to: ['bob'], subject: 'Hi', body: 'x' });

      vi.setSystemTime(new Date('2026-06-01T08:05:00.000Z'));
      expect(markRead(store.db, message.id, bob)).toBe('2026-06-01T08:05:00.000Z');

      vi.setSystemTime(new Date('2026-06-01T08:10:00.000Z'));
      expect(markRead(store.db, message.id, bob)).toBe('2026-06-01T08:05:00.000Z');
    });

    it('should also mark the message read when acknowledging', () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2026-06-01T08:00:00.000Z'));
      const message = send(store.db, {
        project: P1,
        sender: 'alice',
        to: ['bob'],
        subject: 'Approve?',
        body: 'x',
        ackRequired: true,
      });

      vi.setSystemTime(new Date('2026-06-01T09:00:00.000Z'));
      expect(markAck(store.db, message.id, bob)).toBe('2026-06-01T09:00:00.000Z');

      vi.setSystemTime(new Date('2026-06-01T09:30:00.000Z'));
      expect(markAck(store.db, message.id, bob)).toBe('2026-06-01T09:00:00.000Z');

      const [recipient] = getRecipients(store.db, message.id);
      expect(recipient.read_ts).toBe('2026-06-01T09:00:00.000Z');
      expect(recipient.ack_ts).toBe('2026-06-01T09:00:00.000Z');
    });

    it('should keep an earlier read timestamp when acknowledging later', () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2026-06-01T08:00:00.000Z'));
      const message = send(store.db, { project: P1, sender: 'alice', to: ['bob'], subject: 'Hi', body: 'x' });
      markRead(store.db, message.id, bob);

      vi.setSystemTime(new Date('2026-06-01T08:30:00.000Z'));
      markAck(store.db, message.id, bob);

      const [recipient] = getRecipients(store.db, message.id);
      expect(recipient.read_ts).toBe('2026-06-01T08:00:00.000Z');
      expect(recipient.ack_ts).toBe('2026-06-01T08:30:00.000Z');
    });

    it('should refuse agents that are not recipients', () => {
      const message = send(store.db, { project: P1, sender: 'alice', to: ['bob'], subject: 'Hi', body: 'x' });

      expect(() => markRead(store.db, message.id, erin)).toThrow(NotRecipientError);
      expect(() => markAck(store.db, message.id, alice)).toThrow(NotRecipientError);
    });

    it('should report unknown messages', () => {
      expect(() => markRead(store.db, 404, bob)).toThrow(NotFoundError);
    });
  });

  describe('reply and threads', () => {
    it('should reply to the original sender within the thread', () => {
      const original = send(store.db, { project: P1, sender: 'alice', to: ['bob'], subject: 'Plan', body: 'v1' });

      const answer = reply(store.db, { messageId: original.id, sender: bob, body: 'Looks good' });
      const followUp = reply(store.db, { messageId: answer.id, sender: alice, body: 'Thanks' });

      expect(answer.subject).toBe('Re: Plan');
      expect(answer.thread_id).toBe(String(original.id));
      expect(answer.recipients.map(r => r.agent_name)).toEqual(['alice']);
      expect(followUp.subject).toBe('Re: Plan');
      expect(followUp.recipients.map(r => r.agent_name)).toEqual(['bob']);

      const thread = getThread(store.db, P1, String(original.id));
      expect(thread.map(m => m.id)).toEqual([original.id, answer.id, followUp.id]);
    });
  });

  describe('inbox and outbox', () => {
    it('should filter the inbox', () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2026-06-01T08:00:00.000Z'));
      const first = send(store.db, { project: P1, sender: 'alice', to: ['bob'], subject: 'One', body: 'x' });
      vi.setSystemTime(new Date('2026-06-01T08:01:00.000Z'));
      const second = send(store.db, {
        project: P1,
        sender: 'erin',
        to: ['bob'],
        subject: 'Two',
        body: 'x',
        importance: 'urgent',
      });
      vi.setSystemTime(new Date('2026-06-01T08:02:00.000Z'));
      markRead(store.db, first.id, bob);

      const inbox = fetchInbox(store.db, bob);
      expect(inbox.map(m => m.subject)).toEqual(['Two', 'One']);
      expect(inbox[0].sender_name).toBe('erin');
      expect(inbox[1].read_ts).toBe('2026-06-01T08:02:00.000Z');

      expect(fetchInbox(store.db, bob, { unreadOnly: true }).map(m => m.id)).toEqual([second.id]);
      expect(fetchInbox(store.db, bob, { urgentOnly: true }).map(m => m.id)).toEqual([second.id]);
      expect(fetchInbox(store.db, bob, { since: '2026-06-01T08:00:00.000Z' }).map(m => m.id)).toEqual([second.id]);
      expect(fetchInbox(store.db, bob, { limit: 1 }).map(m => m.id)).toEqual([second.id]);
    });

    it('should list sent messages with recipient addresses', () => {
      setContactPolicy(store.db, carol, 'open');
      const message = send(store.db, {
        project: P1,
        sender: 'alice',
        to: ['carol@repo-two', 'bob'],
        subject: 'Sync',
        body: 'x',
      });

      const outbox = fetchOutbox(store.db, alice);
      expect(outbox).toHaveLength(1);
      expect(outbox[0].id).toBe(message.id);
      expect(outbox[0].recipients).toEqual(['bob', 'carol@repo-two']);
    });

    it('should gather an agent name\'s inbox across a product', () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2026-06-01T08:00:00.000Z'));
      addAgent(store.db, '/repo/two', 'bob');
      ensureProduct(store.db, 'suite');
      linkProjectToProduct(store.db, 'suite', 'repo-one');
      linkProjectToProduct(store.db, 'suite', 'repo-two');

      const local = send(store.db, { project: P1, sender: 'alice', to: ['bob'], subject: 'Local', body: 'x' });
      vi.setSystemTime(new Date('2026-06-01T08:01:00.000Z'));
      const remote = send(store.db, {
        project: P1,
        sender: 'alice',
        to: ['bob@repo-two'],
        subject: 'Remote',
        body: 'x',
      });

      const inbox = fetchProductInbox(store.db, 'suite', 'bob');
      expect(inbox.map(m => m.id)).toEqual([remote.id, local.id]);
    });
  });

  describe('pruneMessages', () => {
    it('should delete messages older than the retention window', () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2026-06-01T08:00:00.000Z'));
      const old = send(store.db, { project: P1, sender: 'alice', to: ['bob'], subject: 'Old', body: 'x' });
      vi.setSystemTime(new Date('2026-07-05T08:00:00.000Z'));
      const recent = send(store.db, { project: P1, sender: 'alice', to: ['bob'], subject: 'New', body: 'x' });

      expect(pruneMessages(store.db, 30)).toBe(1);
      expect(getMessage(store.db, old.id)).toBeUndefined();
      expect(fetchInbox(store.db, bob).map(m => m.id)).toEqual([recent.id]);
    });
  });
});
