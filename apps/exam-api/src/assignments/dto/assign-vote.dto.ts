import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsNumber, IsString, MaxLength } from 'class-validator';

/**
 * AssignVoteDto - body of PUT /exams/:examId/vote.
 * Only the type is checked here; the 0..100 range is a ledger rule and
 * fails with INVALID_VOTE, not with a generic validation error.
 */
export class AssignVoteDto {
  @ApiProperty({ description: 'User whose assignment is graded', example: '7b0c3c5e-9a53-4c1e-8d7f-2f4de0f0a001' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  userId!: string;

  @ApiProperty({ minimum: 0, maximum: 100, example: 77 })
  @IsNumber({ allowNaN: false, allowInfinity: false })
  vote!: number;
}
