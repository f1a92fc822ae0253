import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { readFile } from 'fs/promises';
import { appConfig } from '../../config/app.config';
import { ToolSchema } from './tool.type';

export type ToolDomain = 'crm' | 'erp' | 'hr' | 'other';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const DOMAIN_KEYWORDS: [ToolDomain, string[]][] = [
  ['crm', ['client', 'customer']],
  ['erp', ['order']],
  ['hr', ['employee', 'department', 'salary', 'organizational']],
];

/**
 * Tool descriptors loaded from JSON schema files. Names are unique; a later
 * file replaces a same-named descriptor from an earlier one.
 */
@Injectable()
export class ToolRegistryService implements OnModuleInit {
  private readonly logger = new Logger(ToolRegistryService.name);
  private readonly tools = new Map<string, ToolSchema>();

  constructor(
    @Inject(appConfig.KEY)
    private readonly config: ConfigType<typeof appConfig>,
  ) {}

  async onModuleInit() {
    await this.loadAll();
  }

  async loadAll(): Promise<boolean> {
    let allLoaded = true;
    for (const file of this.config.toolSchemaFiles) {
      const loaded = await this.loadSchema(file);
      allLoaded = allLoaded && loaded;
    }
    this.logger.log(`Tool registry ready | tools=${this.tools.size} | complete=${allLoaded}`);
    return allLoaded;
  }

  async loadSchema(file: string): Promise<boolean> {
    let document: unknown;
    try {
      document = JSON.parse(await readFile(file, 'utf-8'));
    } catch (err) {
      this.logger.error(`schema_load_failed | file=${file} | ${String(err)}`);
      return false;
    }

    if (!isRecord(document) || !Array.isArray(document.tools)) {
      this.logger.error(`schema_invalid | file=${file} | reason=missing tools array`);
      return false;
    }

    let count = 0;
    for (const entry of document.tools) {
      const tool = this.toToolSchema(entry);
      if (!tool) {
        this.logger.warn(`schema_entry_skipped | file=${file} | reason=missing name`);
        continue;
      }
      this.tools.set(tool.name, tool);
      count += 1;
    }

    this.logger.log(`Loaded ${count} tools from ${file}`);
    return true;
  }

  get(name: string): ToolSchema | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  getAll(): ToolSchema[] {
    return Array.from(this.tools.values());
  }

  getNames(): string[] {
    return Array.from(this.tools.keys());
  }

  /** Groups tool descriptors by the business domain their name refers to. */
  categorize(): Record<ToolDomain, ToolSchema[]> {
    const groups: Record<ToolDomain, ToolSchema[]> = { crm: [], erp: [], hr: [], other: [] };
    for (const tool of this.getAll()) {
      const name = tool.name.toLowerCase();
      const match = DOMAIN_KEYWORDS.find(([, keywords]) => keywords.some((k) => name.includes(k)));
      groups[match ? match[0] : 'other'].push(tool);
    }
    return groups;
  }

  private toToolSchema(entry: unknown): ToolSchema | null {
    if (!isRecord(entry) || typeof entry.name !== 'string' || entry.name.trim() === '') {
      return null;
    }
    // `input_schema` is accepted as an alias of `parameters`
    const parameters = entry.parameters ?? entry.input_schema;
    return {
      name: entry.name,
      description: typeof entry.description === 'string' ? entry.description : '',
      parameters: isRecord(parameters) ? parameters : { type: 'object', properties: {} },
    };
  }
}
