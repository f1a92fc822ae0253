import { Type } from 'class-transformer';
import { IsNotEmpty, IsNumber, IsOptional, IsString, Min } from 'class-validator';
import { UpdateClientBalanceDto } from '../../../crm/dto/update-client-balance.dto';
import { UpdateClientDto } from '../../../crm/dto/update-client.dto';

export class ClientIdParams {
  @IsString()
  @IsNotEmpty()
  client_id!: string;
}

export class UpdateClientParams extends UpdateClientDto {
  @IsString()
  @IsNotEmpty()
  client_id!: string;
}

export class UpdateClientBalanceParams extends UpdateClientBalanceDto {
  @IsString()
  @IsNotEmpty()
  client_id!: string;
}

export class FilterClientsByBalanceParams {
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  @IsOptional()
  min_balance?: number;

  @Type(() => Number)
  @IsNumber()
  @Min(0)
  @IsOptional()
  max_balance?: number;
}

export class SearchParams {
  @IsString()
  @IsNotEmpty()
  query!: string;
}
