import {
  BadRequestException,
  ConflictException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { ClientErrors } from '../common/errors/client.errors';
import { touchedAt } from '../common/utils/timestamp';
import { Store } from '../storage/store';
import { CLIENT_STORE } from '../storage/storage.tokens';
import { Client, ClientStatistics } from './client.entity';
import { CreateClientDto } from './dto/create-client.dto';
import { UpdateClientDto } from './dto/update-client.dto';

const UPDATABLE_FIELDS = [
  'name',
  'email',
  'phone',
  'company',
  'industry',
  'status',
  'notes',
] as const;

@Injectable()
export class CrmService {
  private readonly logger = new Logger(CrmService.name);

  constructor(
    @Inject(CLIENT_STORE)
    private readonly clients: Store<Client>,
  ) {}

  async getClientById(clientId: string): Promise<Client> {
    const clients = await this.clients.load();
    return this.findIn(clients, clientId);
  }

  async createClient(dto: CreateClientDto): Promise<Client> {
    const email = dto.email.trim().toLowerCase();

    const client = await this.clients.update((clients) => {
      this.ensureEmailAvailable(clients, email);

      const now = new Date().toISOString();
      const created: Client = {
        id: uuidv4(),
        name: dto.name.trim(),
        email,
        ...(dto.phone !== undefined && { phone: dto.phone }),
        ...(dto.company !== undefined && { company: dto.company }),
        ...(dto.industry !== undefined && { industry: dto.industry }),
        status: dto.status ?? 'active',
        balance: dto.balance ?? 0,
        ...(dto.notes !== undefined && { notes: dto.notes }),
        created_at: now,
        updated_at: now,
      };
      clients.push(created);
      return created;
    });

    this.logger.log(`client_created | id=${client.id} | email=${client.email}`);
    return client;
  }

  async updateClient(clientId: string, dto: UpdateClientDto): Promise<Client> {
    const patch = UPDATABLE_FIELDS.filter((field) => dto[field] !== undefined);
    if (patch.length === 0) {
      throw new BadRequestException(ClientErrors.CLIENT_UPDATE_EMPTY);
    }

    const client = await this.clients.update((clients) => {
      const current = this.findIn(clients, clientId);
      const email = dto.email?.trim().toLowerCase();

      if (email !== undefined && email !== current.email) {
        this.ensureEmailAvailable(clients, email, clientId);
      }

      const updated: Client = {
        ...current,
        ...(dto.name !== undefined && { name: dto.name.trim() }),
        ...(email !== undefined && { email }),
        ...(dto.phone !== undefined && { phone: dto.phone }),
        ...(dto.company !== undefined && { company: dto.company }),
        ...(dto.industry !== undefined && { industry: dto.industry }),
        ...(dto.status !== undefined && { status: dto.status }),
        ...(dto.notes !== undefined && { notes: dto.notes }),
        updated_at: touchedAt(current.updated_at),
      };
      clients[clients.indexOf(current)] = updated;
      return updated;
    });

    this.logger.log(`client_updated | id=${clientId} | fields=${patch.join(',')}`);
    return client;
  }

  async updateClientBalance(clientId: string, newBalance: number): Promise<Client> {
    if (typeof newBalance !== 'number' || !Number.isFinite(newBalance) || newBalance < 0) {
      throw new BadRequestException(ClientErrors.CLIENT_INVALID_BALANCE);
    }

    const client = await this.clients.update((clients) => {
      const current = this.findIn(clients, clientId);
      const updated: Client = {
        ...current,
        balance: newBalance,
        updated_at: touchedAt(current.updated_at),
      };
      clients[clients.indexOf(current)] = updated;
      return updated;
    });

    this.logger.log(`client_balance_updated | id=${clientId} | balance=${newBalance}`);
    return client;
  }

  listAllClients(): Promise<Client[]> {
    return this.clients.load();
  }

  async filterClientsByBalance(minBalance?: number, maxBalance?: number): Promise<Client[]> {
    if (minBalance !== undefined && maxBalance !== undefined && minBalance > maxBalance) {
      throw new BadRequestException(ClientErrors.CLIENT_INVALID_BALANCE_RANGE);
    }

    const clients = await this.clients.load();
    const filtered = clients.filter((client) => {
      const balance = Number(client.balance) || 0;
      if (minBalance !== undefined && balance < minBalance) return false;
      if (maxBalance !== undefined && balance > maxBalance) return false;
      return true;
    });

    this.logger.log(
      `filter_clients_by_balance | min=${minBalance ?? '-'} | max=${maxBalance ?? '-'} | count=${filtered.length}`,
    );
    return filtered;
  }

  async deleteClient(clientId: string): Promise<{ deleted: true; id: string }> {
    await this.clients.update((clients) => {
      const index = clients.findIndex((c) => c.id === clientId);
      if (index === -1) {
        throw new NotFoundException(ClientErrors.CLIENT_NOT_FOUND);
      }
      clients.splice(index, 1);
    });

    this.logger.log(`client_deleted | id=${clientId}`);
    return { deleted: true, id: clientId };
  }

  async searchClients(query: string): Promise<Client[]> {
    const needle = (query ?? '').trim().toLowerCase();
    if (!needle) {
      throw new BadRequestException(ClientErrors.CLIENT_SEARCH_QUERY_EMPTY);
    }

    const clients = await this.clients.load();
    return clients.filter((client) =>
      [client.name, client.email, client.company].some((value) =>
        (value ?? '').toLowerCase().includes(needle),
      ),
    );
  }

  async getClientStatistics(): Promise<ClientStatistics> {
    const clients = await this.clients.load();
    const statusDistribution: Record<string, number> = {};
    const industryDistribution: Record<string, number> = {};
    let totalBalance = 0;

    for (const client of clients) {
      const status = client.status ?? 'unknown';
      const industry = client.industry ?? 'unknown';
      statusDistribution[status] = (statusDistribution[status] ?? 0) + 1;
      industryDistribution[industry] = (industryDistribution[industry] ?? 0) + 1;
      totalBalance += Number(client.balance) || 0;
    }

    return {
      total_clients: clients.length,
      status_distribution: statusDistribution,
      industry_distribution: industryDistribution,
      total_balance: totalBalance,
      average_balance: clients.length > 0 ? totalBalance / clients.length : 0,
      last_updated: new Date().toISOString(),
    };
  }

  private findIn(clients: Client[], clientId: string): Client {
    const client = clients.find((c) => c.id === clientId);
    if (!client) {
      throw new NotFoundException(ClientErrors.CLIENT_NOT_FOUND);
    }
    return client;
  }

  private ensureEmailAvailable(clients: Client[], email: string, exceptId?: string) {
    const taken = clients.some(
      (c) => c.id !== exceptId && (c.email ?? '').toLowerCase() === email,
    );
    if (taken) {
      throw new ConflictException(ClientErrors.CLIENT_EMAIL_IN_USE);
    }
  }
}
