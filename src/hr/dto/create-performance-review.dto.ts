import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  IsArray,
  IsDateString,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  Min,
} from 'class-validator';

export class CreatePerformanceReviewDto {
  @ApiProperty({ example: 'EMP000' })
  @IsString()
  @IsNotEmpty()
  reviewer_id!: string;

  @ApiProperty({ example: '2025-06-30' })
  @IsDateString()
  review_date!: string;

  @ApiProperty({ example: '2025-H1' })
  @IsString()
  @IsNotEmpty()
  review_period!: string;

  @ApiProperty({ minimum: 1, maximum: 5, example: 4 })
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(5)
  overall_rating!: number;

  @ApiProperty({ example: 'Consistently delivers on sprint goals.' })
  @IsString()
  comments!: string;

  @ApiPropertyOptional({ type: [String] })
  @IsArray()
  @IsString({ each: true })
  @IsOptional()
  goals?: string[];
}
