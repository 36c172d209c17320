import { IModelSchema } from '../parser/types';

/**
 * Model schema backed by a plain record of attribute name to column handle
 *
 * @example
 * ```typescript
 * const model = new RecordModelSchema({ id: 'users.id', name: 'users.name' });
 * model.resolve('id'); // 'users.id'
 * ```
 */
export class RecordModelSchema<TColumn> implements IModelSchema<TColumn> {
  private readonly columns: ReadonlyMap<string, TColumn>;

  constructor(columns: Record<string, TColumn>) {
    this.columns = new Map(Object.entries(columns));
  }

  public resolve(attribute: string): TColumn | undefined {
    return this.columns.get(attribute);
  }

  public attributes(): string[] {
    return [...this.columns.keys()];
  }
}
