import { FastifyInstance } from 'fastify';
import { IdParamsSchema } from '../schemas/common.schema.js';
import {
  AddMemberSchema,
  CreateTeamSchema,
  JoinTeamSchema,
  MemberParamsSchema,
  TransferOwnershipSchema,
  UpdateTeamSchema,
} from '../schemas/teams.schema.js';
import * as teamsService from '../services/teams.service.js';
import * as membershipService from '../services/membership.service.js';
import { actorFrom } from '../plugins/auth.plugin.js';

export async function teamsRoutes(fastify: FastifyInstance) {
  fastify.addHook('onRequest', fastify.authenticate);

  /**
   * GET /api/teams
   * Teams the caller belongs to (every team for admins)
   */
  fastify.get('/api/teams', async (request, reply) => {
    const data = await teamsService.listTeams(actorFrom(request));
    return reply.send({ data });
  });

  /**
   * POST /api/teams
   * Create a team; the caller becomes its owner
   */
  fastify.post('/api/teams', async (request, reply) => {
    const input = CreateTeamSchema.parse(request.body);
    const team = await teamsService.createTeam(actorFrom(request), input);
    return reply.status(201).send(team);
  });

  /**
   * GET /api/teams/:id
   * Team with its members
   */
  fastify.get('/api/teams/:id', async (request, reply) => {
    const { id } = IdParamsSchema.parse(request.params);
    const team = await teamsService.getTeam(actorFrom(request), id);
    return reply.send(team);
  });

  fastify.put('/api/teams/:id', async (request, reply) => {
    const { id } = IdParamsSchema.parse(request.params);
    const input = UpdateTeamSchema.parse(request.body);
    const team = await teamsService.updateTeam(actorFrom(request), id, input);
    return reply.send(team);
  });

  fastify.delete('/api/teams/:id', async (request, reply) => {
    const { id } = IdParamsSchema.parse(request.params);
    await teamsService.deleteTeam(actorFrom(request), id);
    return reply.status(204).send();
  });

  /**
   * POST /api/teams/:id/invite-code
   * Issue a fresh invite code
   */
  fastify.post('/api/teams/:id/invite-code', async (request, reply) => {
    const { id } = IdParamsSchema.parse(request.params);
    const team = await teamsService.regenerateInviteCode(actorFrom(request), id);
    return reply.send({ inviteCode: team.inviteCode });
  });

  // ==========================================================================
  // Members
  // ==========================================================================

  fastify.get('/api/teams/:id/members', async (request, reply) => {
    const { id } = IdParamsSchema.parse(request.params);
    const data = await teamsService.listTeamMembers(actorFrom(request), id);
    return reply.send({ data });
  });

  fastify.post('/api/teams/:id/members', async (request, reply) => {
    const { id } = IdParamsSchema.parse(request.params);
    const { userId, role } = AddMemberSchema.parse(request.body);
    const membership = await teamsService.addTeamMember(actorFrom(request), id, userId, role);
    return reply.status(201).send(membership);
  });

  fastify.delete('/api/teams/:id/members/:userId', async (request, reply) => {
    const { id, userId } = MemberParamsSchema.parse(request.params);
    await teamsService.removeTeamMember(actorFrom(request), id, userId);
    return reply.status(204).send();
  });

  /**
   * POST /api/teams/:id/transfer-ownership
   */
  fastify.post('/api/teams/:id/transfer-ownership', async (request, reply) => {
    const { id } = IdParamsSchema.parse(request.params);
    const { userId } = TransferOwnershipSchema.parse(request.body);
    const team = await teamsService.transferTeamOwnership(actorFrom(request), id, userId);
    return reply.send(team);
  });

  /**
   * POST /api/teams/:id/join
   * Join with the team's invite code
   */
  fastify.post('/api/teams/:id/join', async (request, reply) => {
    const { id } = IdParamsSchema.parse(request.params);
    const { inviteCode } = JoinTeamSchema.parse(request.body);
    const membership = await membershipService.joinWithInviteCode(id, inviteCode, request.user.sub);
    return reply.status(201).send(membership);
  });

  fastify.post('/api/teams/:id/leave', async (request, reply) => {
    const { id } = IdParamsSchema.parse(request.params);
    await membershipService.leaveTeam(id, request.user.sub);
    return reply.status(204).send();
  });
}
