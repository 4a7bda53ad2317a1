import { FilterSkipError } from '../errors/migration.errors';
import { ObjectRef } from '../types/migration.interface';
import { Stage } from './stage';

export type ObjectPredicate = (item: ObjectRef) => boolean;

/** Drops every item for which `predicate` returns true. */
export class Filter extends Stage {
  constructor(
    name: string,
    private readonly predicate: ObjectPredicate
  ) {
    super(name);
  }

  protected async process(item: ObjectRef): Promise<ObjectRef> {
    if (this.predicate(item)) {
      throw new FilterSkipError(this.name);
    }
    return item;
  }
}
