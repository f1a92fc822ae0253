import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

export class ProcessCommandDto {
  @ApiProperty({
    description: 'Natural-language business request',
    example: 'List all clients with balance over 5000',
  })
  @IsString()
  @IsNotEmpty()
  @MaxLength(2000)
  command!: string;
}
