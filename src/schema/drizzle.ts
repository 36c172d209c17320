import { AnyColumn, Table, getTableColumns } from 'drizzle-orm';
import { IModelSchema } from '../parser/types';

/**
 * Model schema over a Drizzle table: attributes are the table's column keys
 *
 * @example
 * ```typescript
 * const users = pgTable('users', { id: integer('id'), name: text('name') });
 * const model = new DrizzleModelSchema(users);
 * ```
 */
export class DrizzleModelSchema implements IModelSchema<AnyColumn> {
  private readonly columns: Record<string, AnyColumn>;

  constructor(public readonly table: Table) {
    this.columns = getTableColumns(table);
  }

  public resolve(attribute: string): AnyColumn | undefined {
    return Object.prototype.hasOwnProperty.call(this.columns, attribute)
      ? this.columns[attribute]
      : undefined;
  }

  public attributes(): string[] {
    return Object.keys(this.columns);
  }
}
