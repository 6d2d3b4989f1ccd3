import { describe, it, expect, beforeEach } from 'vitest';
import { eq } from 'drizzle-orm';
import { db } from '../lib/db.js';
import { auditEvents, evaluations } from '../db/schema.js';
import {
  ConflictError,
  ForbiddenError,
  InvalidOperationError,
  ValidationError,
} from '../lib/errors.js';
import * as evaluationsService from '../services/evaluations.service.js';
import { actorOf, fixtures, resetDatabase, testUuid } from './setup.js';

const OWNER = testUuid('1');
const MEMBER = testUuid('2');
const COLLEAGUE = testUuid('3');
const STRANGER = testUuid('4');
const TEAM = testUuid('100');
const OTHER_TEAM = testUuid('101');

const owner = actorOf({ id: OWNER, isAdmin: false });
const member = actorOf({ id: MEMBER, isAdmin: false });
const colleague = actorOf({ id: COLLEAGUE, isAdmin: false });
const admin = actorOf({ id: testUuid('9'), isAdmin: true });

describe('Evaluations', () => {
  beforeEach(() => {
    resetDatabase();
    fixtures.user({ id: OWNER });
    fixtures.user({ id: MEMBER });
    fixtures.user({ id: COLLEAGUE });
    fixtures.user({ id: STRANGER });
    fixtures.user({ id: testUuid('9'), isAdmin: true });
    fixtures.team(TEAM, OWNER, [MEMBER, COLLEAGUE]);
    fixtures.team(OTHER_TEAM, STRANGER);
  });

  describe('createEvaluation', () => {
    it('rejects evaluating yourself', async () => {
      await expect(
        evaluationsService.createEvaluation(member, { teamId: TEAM, subjectId: MEMBER, score: 4 }),
      ).rejects.toThrow(InvalidOperationError);
    });

    it('forbids evaluating someone who does not share the team', async () => {
      await expect(
        evaluationsService.createEvaluation(member, { teamId: TEAM, subjectId: STRANGER, score: 4 }),
      ).rejects.toThrow(ForbiddenError);
    });

    it('forbids evaluating in a team the evaluator is not in', async () => {
      await expect(
        evaluationsService.createEvaluation(member, {
          teamId: OTHER_TEAM,
          subjectId: STRANGER,
          score: 3,
        }),
      ).rejects.toThrow('You are not a member of this team');
    });

    describe('as an admin', () => {
      it('still rejects evaluating yourself', async () => {
        fixtures.membership(TEAM, admin.id);
        await expect(
          evaluationsService.createEvaluation(admin, { teamId: TEAM, subjectId: admin.id, score: 3 }),
        ).rejects.toThrow(InvalidOperationError);
      });

      it('requires the admin to belong to the team', async () => {
        await expect(
          evaluationsService.createEvaluation(admin, { teamId: TEAM, subjectId: MEMBER, score: 3 }),
        ).rejects.toThrow('You are not a member of this team');
      });

      it('requires the subject to belong to the team', async () => {
        fixtures.membership(TEAM, admin.id);
        await expect(
          evaluationsService.createEvaluation(admin, { teamId: TEAM, subjectId: STRANGER, score: 3 }),
        ).rejects.toThrow('Evaluator and subject do not share this team');
        expect(db.select().from(evaluations).all()).toEqual([]);
      });

      it('evaluates a fellow member', async () => {
        fixtures.membership(TEAM, admin.id);
        const evaluation = await evaluationsService.createEvaluation(admin, {
          teamId: TEAM,
          subjectId: MEMBER,
          score: 5,
        });
        expect(evaluation.evaluatorId).toBe(admin.id);
      });
    });

    it('records the evaluation with an audit event', async () => {
      const evaluation = await evaluationsService.createEvaluation(member, {
        teamId: TEAM,
        subjectId: COLLEAGUE,
        score: 5,
        notes: 'Great pairing',
      });

      expect(evaluation).toMatchObject({
        teamId: TEAM,
        subjectId: COLLEAGUE,
        evaluatorId: MEMBER,
        taskId: null,
        score: 5,
        notes: 'Great pairing',
      });

      const events = db.select().from(auditEvents).where(eq(auditEvents.entityId, evaluation.id)).all();
      expect(events.map((e) => e.action)).toEqual(['CREATE']);
    });

    it('only accepts completed tasks of the same team, once per subject', async () => {
      fixtures.task({ id: testUuid('500'), teamId: TEAM, creatorId: COLLEAGUE, status: 'IN_PROGRESS' });
      fixtures.task({ id: testUuid('501'), teamId: TEAM, creatorId: COLLEAGUE, status: 'DONE' });
      fixtures.task({ id: testUuid('502'), teamId: OTHER_TEAM, creatorId: STRANGER, status: 'DONE' });

      await expect(
        evaluationsService.createEvaluation(member, {
          teamId: TEAM,
          subjectId: COLLEAGUE,
          taskId: testUuid('500'),
          score: 4,
        }),
      ).rejects.toThrow('Only completed tasks can be evaluated');

      await expect(
        evaluationsService.createEvaluation(member, {
          teamId: TEAM,
          subjectId: COLLEAGUE,
          taskId: testUuid('502'),
          score: 4,
        }),
      ).rejects.toThrow(ValidationError);

      await evaluationsService.createEvaluation(member, {
        teamId: TEAM,
        subjectId: COLLEAGUE,
        taskId: testUuid('501'),
        score: 4,
      });
      await expect(
        evaluationsService.createEvaluation(owner, {
          teamId: TEAM,
          subjectId: COLLEAGUE,
          taskId: testUuid('501'),
          score: 2,
        }),
      ).rejects.toThrow(ConflictError);
    });
  });

  describe('visibility and changes', () => {
    let evaluationId: string;

    beforeEach(async () => {
      const evaluation = await evaluationsService.createEvaluation(member, {
        teamId: TEAM,
        subjectId: COLLEAGUE,
        score: 3,
      });
      evaluationId = evaluation.id;
    });

    it('is visible to the subject, evaluator, owner and admins only', async () => {
      expect((await evaluationsService.getEvaluation(colleague, evaluationId)).score).toBe(3);
      expect((await evaluationsService.getEvaluation(member, evaluationId)).score).toBe(3);
      expect((await evaluationsService.getEvaluation(owner, evaluationId)).score).toBe(3);
      expect((await evaluationsService.getEvaluation(admin, evaluationId)).score).toBe(3);

      const third = actorOf({ id: testUuid('5'), isAdmin: false });
      fixtures.user({ id: testUuid('5') });
      await expect(evaluationsService.getEvaluation(third, evaluationId)).rejects.toThrow(
        ForbiddenError,
      );
    });

    it('filters subject lists to what the caller may read', async () => {
      const extra = actorOf({ id: testUuid('6'), isAdmin: false });
      fixtures.user({ id: testUuid('6') });
      await evaluationsService.createEvaluation(owner, {
        teamId: TEAM,
        subjectId: COLLEAGUE,
        score: 5,
      });

      // MEMBER sees only the one they wrote; COLLEAGUE sees both
      expect(
        (await evaluationsService.listEvaluationsForSubject(member, COLLEAGUE)).map((e) => e.score),
      ).toEqual([3]);
      expect(
        (await evaluationsService.listEvaluationsForSubject(colleague, COLLEAGUE))
          .map((e) => e.score)
          .sort(),
      ).toEqual([3, 5]);
      expect(await evaluationsService.listEvaluationsForSubject(extra, COLLEAGUE)).toEqual([]);
    });

    it('lets only the evaluator or owner update and delete', async () => {
      await expect(
        evaluationsService.updateEvaluation(colleague, evaluationId, { score: 5 }),
      ).rejects.toThrow(ForbiddenError);

      const updated = await evaluationsService.updateEvaluation(member, evaluationId, { score: 4 });
      expect(updated.score).toBe(4);

      await evaluationsService.deleteEvaluation(owner, evaluationId);
      expect(await evaluationsService.listTeamEvaluations(owner, TEAM)).toEqual([]);
    });

    it('summarises scores for a user', async () => {
      await evaluationsService.createEvaluation(owner, {
        teamId: TEAM,
        subjectId: COLLEAGUE,
        score: 4,
      });
      await evaluationsService.createEvaluation(owner, {
        teamId: TEAM,
        subjectId: COLLEAGUE,
        score: 4,
      });

      const stats = await evaluationsService.getEvaluationStatistics(colleague, COLLEAGUE);
      expect(stats).toEqual({
        userId: COLLEAGUE,
        count: 3,
        average: 3.67,
        distribution: { 1: 0, 2: 0, 3: 1, 4: 2, 5: 0 },
      });
    });

    it('returns a null average without evaluations', async () => {
      const stats = await evaluationsService.getEvaluationStatistics(owner, OWNER);
      expect(stats).toEqual({
        userId: OWNER,
        count: 0,
        average: null,
        distribution: { 1: 0, 2: 0, 3: 0, 4: 0, 5: 0 },
      });
    });
  });
});
