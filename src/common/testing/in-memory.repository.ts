import type { FindManyOptions, FindOneOptions } from 'typeorm';

type Direction = 'ASC' | 'DESC';

/**
 * 테스트용 Repository 대역.
 * 서비스가 사용하는 find / findOne 의 where(동등 비교), order, take 만 해석한다.
 */
export class InMemoryRepository<T extends object> {
  constructor(private readonly rows: T[] = []) {}

  async find(options: FindManyOptions<T> = {}): Promise<T[]> {
    let result = this.rows.filter((row) => matches(row, options.where));

    const order = orderEntries(options.order);
    if (order.length > 0) {
      result = [...result].sort((a, b) => {
        for (const [key, direction] of order) {
          const diff = compare(Reflect.get(a, key), Reflect.get(b, key));
          if (diff !== 0) {
            return direction === 'DESC' ? -diff : diff;
          }
        }
        return 0;
      });
    }

    if (options.take !== undefined) {
      result = result.slice(0, options.take);
    }
    return result;
  }

  async findOne(options: FindOneOptions<T>): Promise<T | null> {
    const [first] = await this.find({ ...options, take: 1 });
    return first ?? null;
  }
}

function matches(row: object, where: unknown): boolean {
  if (where === undefined || where === null || typeof where !== 'object') {
    return true;
  }
  return Object.entries(where).every(
    ([key, expected]) =>
      expected === undefined || Reflect.get(row, key) === expected,
  );
}

function orderEntries(order: unknown): Array<[string, Direction]> {
  if (order === undefined || order === null || typeof order !== 'object') {
    return [];
  }
  return Object.entries(order).map(([key, direction]): [string, Direction] => [
    key,
    String(direction).toUpperCase() === 'DESC' ? 'DESC' : 'ASC',
  ]);
}

function compare(a: unknown, b: unknown): number {
  const left = a instanceof Date ? a.getTime() : a;
  const right = b instanceof Date ? b.getTime() : b;
  if (typeof left === 'number' && typeof right === 'number') {
    return left - right;
  }
  return String(left).localeCompare(String(right));
}
