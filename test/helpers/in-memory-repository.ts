import { randomUUID } from 'crypto';
import { FindOperator } from 'typeorm';

type Where = Record<string, unknown>;

interface FindOptions {
  where?: Where | Where[];
  order?: Record<string, 'ASC' | 'DESC'>;
}

/**
 * In-process stand-in for a TypeORM repository covering the calls the services
 * make: equality, `In` and `LessThan` criteria, single-column ordering.
 * `createdAt` is assigned from a strictly increasing clock so ordering is stable.
 */
export class InMemoryRepository<T extends object> {
  readonly rows: T[] = [];
  private lastTimestamp = 0;

  constructor(private readonly Entity: new () => T) {}

  create(fields: Partial<T>): T {
    return Object.assign(new this.Entity(), fields);
  }

  async save(entity: T): Promise<T> {
    if (Reflect.get(entity, 'id') === undefined) {
      Reflect.set(entity, 'id', randomUUID());
    }
    const now = this.tick();
    for (const column of ['createdAt', 'updatedAt']) {
      if (Reflect.get(entity, column) === undefined) {
        Reflect.set(entity, column, now);
      }
    }
    if (!this.rows.includes(entity)) {
      this.rows.push(entity);
    }
    return entity;
  }

  async findOne(options: FindOptions): Promise<T | null> {
    return this.rows.find((row) => this.matches(row, options.where)) ?? null;
  }

  async find(options: FindOptions = {}): Promise<T[]> {
    const found = this.rows.filter((row) => this.matches(row, options.where));
    const [column, direction] = Object.entries(options.order ?? {})[0] ?? [];
    if (column) {
      const sign = direction === 'DESC' ? -1 : 1;
      found.sort((a, b) => sign * compare(Reflect.get(a, column), Reflect.get(b, column)));
    }
    return found;
  }

  async count(options: FindOptions = {}): Promise<number> {
    return (await this.find(options)).length;
  }

  async update(id: unknown, fields: Partial<T>): Promise<{ affected: number }> {
    const row = this.rows.find((candidate) => Reflect.get(candidate, 'id') === id);
    if (row) {
      Object.assign(row, fields);
    }
    return { affected: row ? 1 : 0 };
  }

  async delete(criteria: Where): Promise<{ affected: number }> {
    const before = this.rows.length;
    const kept = this.rows.filter((row) => !this.matches(row, criteria));
    this.rows.splice(0, this.rows.length, ...kept);
    return { affected: before - kept.length };
  }

  clear(): void {
    this.rows.splice(0, this.rows.length);
  }

  private tick(): Date {
    this.lastTimestamp = Math.max(Date.now(), this.lastTimestamp + 1);
    return new Date(this.lastTimestamp);
  }

  private matches(row: T, where: Where | Where[] | undefined): boolean {
    if (!where) {
      return true;
    }
    if (Array.isArray(where)) {
      return where.some((clause) => this.matches(row, clause));
    }
    return Object.entries(where).every(([column, expected]) =>
      matchesValue(Reflect.get(row, column), expected),
    );
  }
}

function matchesValue(actual: unknown, expected: unknown): boolean {
  if (expected instanceof FindOperator) {
    const operand: unknown = expected.value;
    switch (expected.type) {
      case 'in':
        return Array.isArray(operand) && operand.includes(actual);
      case 'lessThan':
        return compare(actual, operand) < 0;
      default:
        throw new Error(`Unsupported operator ${expected.type}`);
    }
  }
  if (expected instanceof Date && actual instanceof Date) {
    return expected.getTime() === actual.getTime();
  }
  return actual === expected;
}

function compare(a: unknown, b: unknown): number {
  const left = a instanceof Date ? a.getTime() : a;
  const right = b instanceof Date ? b.getTime() : b;
  if (typeof left === 'number' && typeof right === 'number') {
    return left - right;
  }
  return String(left).localeCompare(String(right));
}
