import type { TeamRole } from '../db/schema.js';
import { ForbiddenError, InvalidOperationError } from './errors.js';

export const ACTIONS = ['read', 'create', 'update', 'delete'] as const;
export type Action = (typeof ACTIONS)[number];

export interface Actor {
  id: string;
  isAdmin: boolean;
}

/**
 * The record being acted on, reduced to the ids the rules need.
 * Ownership chains (comment -> task -> team) are resolved by the caller.
 */
export type Resource =
  | { kind: 'team'; teamId: string | null }
  | { kind: 'task'; teamId: string; creatorId: string; assigneeId: string | null }
  | { kind: 'meeting'; teamId: string; creatorId: string }
  | { kind: 'comment'; teamId: string; authorId: string }
  | { kind: 'evaluation'; teamId: string; evaluatorId: string; subjectId: string };

export type ResourceKind = Resource['kind'];

/**
 * Lookups loaded before the decision is made.
 */
export interface AccessContext {
  /** Team roles held by the actor, keyed by team id. */
  roles: ReadonlyMap<string, TeamRole>;
  /** Teams the evaluation subject belongs to. Only read for evaluation create. */
  subjectTeamIds?: ReadonlySet<string>;
}

export type DenialReason = 'FORBIDDEN' | 'INVALID_OPERATION';

export type Decision =
  | { allowed: true }
  | { allowed: false; reason: DenialReason; message: string };

type Rule<R extends Resource = Resource> = (
  actor: Actor,
  resource: R,
  role: TeamRole,
  context: AccessContext,
) => Decision;

type RuleTable = {
  [K in ResourceKind]: Partial<Record<Action, Rule<Extract<Resource, { kind: K }>>>>;
};

const ALLOW: Decision = { allowed: true };

function deny(reason: DenialReason, message: string): Decision {
  return { allowed: false, reason, message };
}

const member: Rule = () => ALLOW;

const ownerOnly: Rule = (_actor, resource, role) =>
  role === 'OWNER' ? ALLOW : deny('FORBIDDEN', `Only the team owner may modify this ${resource.kind}`);

/**
 * Per-(resource, action) rules for team members. Admins and team creation are
 * decided before the table is consulted; a missing entry is a denial.
 */
export const ACCESS_RULES: RuleTable = {
  team: {
    read: member,
    update: ownerOnly,
    delete: ownerOnly,
  },
  task: {
    read: member,
    create: member,
    update: taskAuthorAssigneeOrOwner,
    delete: taskAuthorAssigneeOrOwner,
  },
  comment: {
    read: member,
    create: member,
    update: (actor, comment, role) =>
      actor.id === comment.authorId || role === 'OWNER'
        ? ALLOW
        : deny('FORBIDDEN', 'Only the comment author or team owner may modify this comment'),
    delete: (actor, comment, role) =>
      actor.id === comment.authorId || role === 'OWNER'
        ? ALLOW
        : deny('FORBIDDEN', 'Only the comment author or team owner may modify this comment'),
  },
  meeting: {
    read: member,
    create: member,
    update: meetingCreatorOrOwner,
    delete: meetingCreatorOrOwner,
  },
  evaluation: {
    read: (actor, evaluation, role) =>
      actor.id === evaluation.subjectId || actor.id === evaluation.evaluatorId || role === 'OWNER'
        ? ALLOW
        : deny('FORBIDDEN', 'Evaluations are visible to their subject, evaluator and the team owner'),
    create: (actor, evaluation, _role, context) => {
      if (actor.id === evaluation.subjectId) {
        return deny('INVALID_OPERATION', 'You cannot evaluate yourself');
      }
      if (!context.subjectTeamIds?.has(evaluation.teamId)) {
        return deny('FORBIDDEN', 'Evaluator and subject do not share this team');
      }
      return ALLOW;
    },
    update: evaluatorOrOwner,
    delete: evaluatorOrOwner,
  },
};

function taskAuthorAssigneeOrOwner(
  actor: Actor,
  task: Extract<Resource, { kind: 'task' }>,
  role: TeamRole,
): Decision {
  if (actor.id === task.creatorId || actor.id === task.assigneeId || role === 'OWNER') {
    return ALLOW;
  }
  return deny('FORBIDDEN', 'Only the task creator, assignee or team owner may modify this task');
}

function meetingCreatorOrOwner(
  actor: Actor,
  meeting: Extract<Resource, { kind: 'meeting' }>,
  role: TeamRole,
): Decision {
  if (actor.id === meeting.creatorId || role === 'OWNER') {
    return ALLOW;
  }
  return deny('FORBIDDEN', 'Only the meeting creator or team owner may modify this meeting');
}

function evaluatorOrOwner(
  actor: Actor,
  evaluation: Extract<Resource, { kind: 'evaluation' }>,
  role: TeamRole,
): Decision {
  if (actor.id === evaluation.evaluatorId || role === 'OWNER') {
    return ALLOW;
  }
  return deny('FORBIDDEN', 'Only the evaluator or team owner may modify this evaluation');
}

function lookupRule<K extends ResourceKind>(
  kind: K,
  action: Action,
): Rule<Extract<Resource, { kind: K }>> | undefined {
  const rules: RuleTable[K] = ACCESS_RULES[kind];
  return rules[action];
}

/**
 * Decide whether `actor` may perform `action` on `resource`.
 */
export function check(
  actor: Actor,
  resource: Resource,
  action: Action,
  context: AccessContext,
): Decision {
  if (actor.isAdmin) {
    return ALLOW;
  }

  if (resource.kind === 'team' && action === 'create') {
    return ALLOW;
  }

  const teamId = resource.teamId;
  const role = teamId === null ? undefined : context.roles.get(teamId);
  if (!role) {
    return deny('FORBIDDEN', 'You are not a member of this team');
  }

  switch (resource.kind) {
    case 'team':
      return applyRule(lookupRule('team', action), actor, resource, role, context);
    case 'task':
      return applyRule(lookupRule('task', action), actor, resource, role, context);
    case 'comment':
      return applyRule(lookupRule('comment', action), actor, resource, role, context);
    case 'meeting':
      return applyRule(lookupRule('meeting', action), actor, resource, role, context);
    case 'evaluation':
      return applyRule(lookupRule('evaluation', action), actor, resource, role, context);
  }
}

function applyRule<R extends Resource>(
  rule: Rule<R> | undefined,
  actor: Actor,
  resource: R,
  role: TeamRole,
  context: AccessContext,
): Decision {
  if (!rule) {
    return deny('FORBIDDEN', `Action is not permitted on ${resource.kind}`);
  }
  return rule(actor, resource, role, context);
}

/**
 * Like check(), but throws the matching error on denial.
 */
export function enforce(
  actor: Actor,
  resource: Resource,
  action: Action,
  context: AccessContext,
): void {
  const decision = check(actor, resource, action, context);
  if (decision.allowed) {
    return;
  }
  if (decision.reason === 'INVALID_OPERATION') {
    throw new InvalidOperationError(decision.message);
  }
  throw new ForbiddenError(decision.message);
}
