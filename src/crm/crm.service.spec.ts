import { BadRequestException, ConflictException, NotFoundException } from '@nestjs/common';
import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { JsonFileStore } from '../storage/json-file.store';
import { Client } from './client.entity';
import { CrmService } from './crm.service';

describe('CrmService', () => {
  let dir: string;
  let file: string;
  let store: JsonFileStore<Client>;
  let service: CrmService;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'crm-'));
    file = join(dir, 'clients.json');
    store = new JsonFileStore<Client>(file, 'clients');
    service = new CrmService(store);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('creates a client with defaults and a lower-cased email', async () => {
    const client = await service.createClient({ name: ' Acme ', email: 'Ops@Acme.Example' });

    expect(client).toMatchObject({
      name: 'Acme',
      email: 'ops@acme.example',
      status: 'active',
      balance: 0,
    });
    expect(client.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(client.created_at).toBe(client.updated_at);
    await expect(service.getClientById(client.id)).resolves.toEqual(client);
  });

  it('rejects a duplicate email and leaves the file unchanged', async () => {
    await service.createClient({ name: 'Acme', email: 'ops@acme.example' });
    const before = readFileSync(file, 'utf-8');

    await expect(
      service.createClient({ name: 'Other', email: 'OPS@acme.example' }),
    ).rejects.toBeInstanceOf(ConflictException);

    expect(readFileSync(file, 'utf-8')).toBe(before);
    await expect(service.listAllClients()).resolves.toHaveLength(1);
  });

  it('throws NotFoundException for an unknown id', async () => {
    await expect(service.getClientById('missing')).rejects.toBeInstanceOf(NotFoundException);
  });

  it('updates only the given fields and bumps updated_at', async () => {
    const created = await service.createClient({
      name: 'Acme',
      email: 'ops@acme.example',
      company: 'Acme Inc',
    });
    await store.save([{ ...created, updated_at: '2000-01-01T00:00:00.000Z' }]);

    const updated = await service.updateClient(created.id, { industry: 'Retail' });

    expect(updated.industry).toBe('Retail');
    expect(updated.company).toBe('Acme Inc');
    expect(updated.created_at).toBe(created.created_at);
    expect(updated.updated_at).not.toBe('2000-01-01T00:00:00.000Z');
  });

  it('moves updated_at forward on back-to-back changes', async () => {
    const created = await service.createClient({ name: 'Acme', email: 'ops@acme.example' });

    const first = await service.updateClientBalance(created.id, 10);
    const second = await service.updateClientBalance(created.id, 20);

    expect(Date.parse(first.updated_at)).toBeGreaterThan(Date.parse(created.updated_at));
    expect(Date.parse(second.updated_at)).toBeGreaterThan(Date.parse(first.updated_at));
  });

  it('rejects an empty update', async () => {
    const created = await service.createClient({ name: 'Acme', email: 'ops@acme.example' });

    await expect(service.updateClient(created.id, {})).rejects.toBeInstanceOf(
      BadRequestException,
    );
  });

  it('rejects changing email to one another client uses', async () => {
    await service.createClient({ name: 'Acme', email: 'ops@acme.example' });
    const other = await service.createClient({ name: 'Beta', email: 'hi@beta.example' });

    await expect(
      service.updateClient(other.id, { email: 'ops@acme.example' }),
    ).rejects.toBeInstanceOf(ConflictException);
  });

  it('sets the balance and refuses negative values', async () => {
    const created = await service.createClient({ name: 'Acme', email: 'ops@acme.example' });

    const updated = await service.updateClientBalance(created.id, 5000);
    expect(updated.balance).toBe(5000);

    await expect(service.updateClientBalance(created.id, -1)).rejects.toBeInstanceOf(
      BadRequestException,
    );
    await expect(service.updateClientBalance('missing', 10)).rejects.toBeInstanceOf(
      NotFoundException,
    );
  });

  it('filters by inclusive balance bounds', async () => {
    await service.createClient({ name: 'Low', email: 'low@x.example', balance: 100 });
    await service.createClient({ name: 'Mid', email: 'mid@x.example', balance: 5000 });
    await service.createClient({ name: 'High', email: 'high@x.example', balance: 9000 });

    const over = await service.filterClientsByBalance(5000);
    expect(over.map((c) => c.name)).toEqual(['Mid', 'High']);

    const range = await service.filterClientsByBalance(100, 5000);
    expect(range.map((c) => c.name)).toEqual(['Low', 'Mid']);

    await expect(service.filterClientsByBalance(10, 5)).rejects.toBeInstanceOf(
      BadRequestException,
    );
  });

  it('searches name, email and company case-insensitively', async () => {
    await service.createClient({ name: 'Acme', email: 'ops@acme.example' });
    await service.createClient({ name: 'Beta', email: 'hi@beta.example', company: 'ACME Holdings' });
    await service.createClient({ name: 'Gamma', email: 'g@gamma.example' });

    const found = await service.searchClients('acme');
    expect(found.map((c) => c.name)).toEqual(['Acme', 'Beta']);
    await expect(service.searchClients('  ')).rejects.toBeInstanceOf(BadRequestException);
  });

  it('deletes a client', async () => {
    const created = await service.createClient({ name: 'Acme', email: 'ops@acme.example' });

    await expect(service.deleteClient(created.id)).resolves.toEqual({
      deleted: true,
      id: created.id,
    });
    await expect(service.listAllClients()).resolves.toEqual([]);
    await expect(service.deleteClient(created.id)).rejects.toBeInstanceOf(NotFoundException);
  });

  it('summarizes statuses, industries and balances', async () => {
    await service.createClient({ name: 'A', email: 'a@x.example', industry: 'Retail', balance: 100 });
    await service.createClient({
      name: 'B',
      email: 'b@x.example',
      industry: 'Retail',
      status: 'prospect',
      balance: 300,
    });

    const stats = await service.getClientStatistics();

    expect(stats).toMatchObject({
      total_clients: 2,
      status_distribution: { active: 1, prospect: 1 },
      industry_distribution: { Retail: 2 },
      total_balance: 400,
      average_balance: 200,
    });
  });
});
