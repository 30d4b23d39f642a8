import { Body, Controller, Get, Param, Post, Put, Query, Req, UseGuards } from '@nestjs/common';
import type { Request } from 'express';
import {
  ApiBearerAuth,
  ApiConflictResponse,
  ApiForbiddenResponse,
  ApiNotFoundResponse,
  ApiOperation,
  ApiTags,
  ApiUnauthorizedResponse,
  ApiUnprocessableEntityResponse
} from '@nestjs/swagger';
import { CurrentUser } from '../auth/current-user.decorator';
import type { AuthenticatedUser } from '../auth/interfaces/authenticated-user';
import { JwtAuthGuard } from '../auth/jwt-auth.guard';
import { RbacGuard } from '../iam/rbac/rbac.guard';
import { RequireAction } from '../iam/rbac/require-action.decorator';
import { AssignVoteDto } from './dto/assign-vote.dto';
import { UngradedQueryDto } from './dto/ungraded-query.dto';
import { GradingWorkflowService } from './grading-workflow.service';
import { toAssignmentView, toRegistrationView } from './results';

/**
 * AssignmentsController - registration, grading and result routes.
 * JwtAuthGuard and RbacGuard settle token and role before any pipe looks at
 * the request body.
 */
@ApiTags('assignments')
@ApiBearerAuth('bearer')
@ApiUnauthorizedResponse({ description: 'TOKEN_MALFORMED | TOKEN_EXPIRED | TOKEN_INVALID' })
@ApiForbiddenResponse({ description: 'FORBIDDEN' })
@UseGuards(JwtAuthGuard, RbacGuard)
@Controller()
export class AssignmentsController {
  constructor(private readonly workflow: GradingWorkflowService) {}

  @Post('exams/:examId/register')
  @RequireAction('register_for_exam')
  @ApiOperation({ summary: 'Register the current user for an exam' })
  @ApiConflictResponse({ description: 'ALREADY_REGISTERED' })
  @ApiNotFoundResponse({ description: 'EXAM_NOT_FOUND' })
  async register(@CurrentUser() user: AuthenticatedUser, @Param('examId') examId: string, @Req() req: Request) {
    const registration = await this.workflow.registerForExamAs(user.claims, examId, { requestId: req.requestId });
    return toRegistrationView(registration);
  }

  @Put('exams/:examId/vote')
  @RequireAction('assign_vote')
  @ApiOperation({ summary: "Grade a user's assignment (once)" })
  @ApiConflictResponse({ description: 'ALREADY_GRADED' })
  @ApiUnprocessableEntityResponse({ description: 'INVALID_VOTE' })
  @ApiNotFoundResponse({ description: 'ASSIGNMENT_NOT_FOUND' })
  async assignVote(
    @CurrentUser() user: AuthenticatedUser,
    @Param('examId') examId: string,
    @Body() dto: AssignVoteDto,
    @Req() req: Request
  ) {
    const graded = await this.workflow.gradeAssignmentAs(user.claims, dto.userId, examId, dto.vote, {
      requestId: req.requestId
    });
    return toAssignmentView(graded);
  }

  @Get('me/exams')
  @RequireAction('view_own_results')
  @ApiOperation({ summary: "Current user's exams, grades and statistics" })
  myResults(@CurrentUser() user: AuthenticatedUser) {
    return this.workflow.myResultsAs(user.claims);
  }

  @Get('ungraded-assignments')
  @RequireAction('view_ungraded')
  @ApiOperation({ summary: 'Assignments still waiting for a vote' })
  async ungraded(@CurrentUser() user: AuthenticatedUser, @Query() query: UngradedQueryDto) {
    const assignments = await this.workflow.ungradedAssignmentsAs(user.claims, {
      userId: query.userId,
      examId: query.examId
    });
    return { assignments, total: assignments.length };
  }
}
