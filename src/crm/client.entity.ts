import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export const CLIENT_STATUSES = ['active', 'inactive', 'prospect', 'archived'] as const;
export type ClientStatus = (typeof CLIENT_STATUSES)[number];

export class Client {
  @ApiProperty({ example: '3f0c2d4e-8d1b-4f6a-9a55-0b1d6a7c2e10' })
  id!: string;

  @ApiProperty({ example: 'Acme Corp' })
  name!: string;

  @ApiProperty({ example: 'billing@acme.example' })
  email!: string;

  @ApiPropertyOptional({ example: '+1-555-0100' })
  phone?: string;

  @ApiPropertyOptional({ example: 'Acme Corporation' })
  company?: string;

  @ApiPropertyOptional({ example: 'Manufacturing' })
  industry?: string;

  @ApiProperty({ enum: CLIENT_STATUSES, default: 'active' })
  status!: ClientStatus;

  @ApiProperty({ example: 2500, minimum: 0 })
  balance!: number;

  @ApiPropertyOptional()
  notes?: string;

  @ApiProperty({ example: '2025-01-01T09:00:00.000Z' })
  created_at!: string;

  @ApiProperty({ example: '2025-01-01T09:00:00.000Z' })
  updated_at!: string;
}

export interface ClientStatistics {
  total_clients: number;
  status_distribution: Record<string, number>;
  industry_distribution: Record<string, number>;
  total_balance: number;
  average_balance: number;
  last_updated: string;
}
