import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsOptional, IsString, MaxLength } from 'class-validator';

export class UngradedQueryDto {
  @ApiPropertyOptional({ description: 'Only this user' })
  @IsOptional()
  @IsString()
  @MaxLength(64)
  userId?: string;

  @ApiPropertyOptional({ description: 'Only this exam' })
  @IsOptional()
  @IsString()
  @MaxLength(64)
  examId?: string;
}
