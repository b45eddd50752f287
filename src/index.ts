export * from './types.js';
export * from './core/errors.js';
export { openStore, writeTransaction, getNumberSetting, updateSetting, SETTING_KEYS } from './core/store.js';
export type { SettingKey } from './core/store.js';
export { resolveDbPath, readGlobalConfig, writeGlobalConfig, paths } from './core/config.js';
export type { GlobalConfig } from './core/config.js';
export { initSchema, schemaExists } from './db/schema.js';
export { getProjectBySlug, touchAgent, getSetting, setSetting, getAllSettings, getStats } from './db/queries.js';
export type { StoreStats } from './db/queries.js';
export { patternsOverlap, matchingPaths, normalizePattern, isGlob } from './core/patterns.js';
export {
  ensureProject,
  requireProject,
  listProjects,
  ensureProduct,
  requireProduct,
  linkProjectToProduct,
  listProductProjects,
  suggestSiblings,
  confirmSiblings,
  dismissSiblings,
  listSiblingSuggestions,
} from './core/projects.js';
export {
  registerAgent,
  deregisterAgent,
  setContactPolicy,
  setAttachmentsPolicy,
  recordActivity,
  listAgents,
  resolveAgent,
  resolveActiveAgent,
  parseAgentAddress,
  formatAgentAddress,
  generateAgentName,
} from './core/agents.js';
export type { RegisterAgentInput } from './core/agents.js';
export {
  decideDelivery,
  canDeliver,
  assertCanDeliver,
  DENY_RECIPIENT_INACTIVE,
  DENY_BLOCKS_ALL,
  DENY_LINK_BLOCKED,
  DENY_NO_CONTACT_PATH,
} from './core/policy.js';
export type { DeliveryDecision } from './core/policy.js';
export {
  reserve,
  release,
  releaseAll,
  renew,
  listActive,
  findPathConflicts,
  pruneReservations,
  reservationsConflict,
  DEFAULT_TTL_SECONDS,
} from './core/reservations.js';
export type { ReserveInput, PathConflict } from './core/reservations.js';
export {
  send,
  reply,
  markRead,
  markAck,
  getMessage,
  getThread,
  getRecipients,
  fetchInbox,
  fetchOutbox,
  fetchProductInbox,
  pruneMessages,
} from './core/messages.js';
export type { SendInput, ReplyInput, SentMessage } from './core/messages.js';
export { requestLink, approveLink, blockLink, getLink, listLinks } from './core/links.js';
export type { RequestLinkInput, LinkDirection } from './core/links.js';
export { parseAttachments, isValidAgentName } from './core/validation.js';
