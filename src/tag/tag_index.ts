/***
 * TagIndex — Entity ids by tag value.
 *
 * Tags are matched with values_equal(), so the index is a list of
 * (tag, ids) buckets searched linearly rather than a Map. Empty buckets
 * are dropped.
 *
 ***/

import { values_equal } from "utils/equality";
import type { EntityID } from "../entity/entity_id";

interface TagBucket {
  readonly tag: object;
  readonly ids: Set<EntityID>;
}

export class TagIndex {
  private readonly buckets: TagBucket[] = [];

  public add(tag: object, id: EntityID): void {
    const bucket = this.find(tag);
    if (bucket !== undefined) {
      bucket.ids.add(id);
      return;
    }
    this.buckets.push({ tag, ids: new Set([id]) });
  }

  public delete(tag: object, id: EntityID): void {
    const at = this.buckets.findIndex((b) => values_equal(b.tag, tag));
    if (at < 0) return;
    const { ids } = this.buckets[at];
    ids.delete(id);
    if (ids.size === 0) this.buckets.splice(at, 1);
  }

  public get(tag: object): ReadonlySet<EntityID> | undefined {
    return this.find(tag)?.ids;
  }

  private find(tag: object): TagBucket | undefined {
    return this.buckets.find((b) => values_equal(b.tag, tag));
  }
}
