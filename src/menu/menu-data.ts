/**
 * Typed slot for auxiliary menu state. The key owns the storage, so reads come
 * back with the key's type and no lookup by runtime type is needed.
 */
export class DataKey<T> {
  private readonly values = new WeakMap<MenuData, T>();

  constructor(readonly description: string) {}

  read(data: MenuData): T | undefined {
    return this.values.get(data);
  }

  write(data: MenuData, value: T): void {
    this.values.set(data, value);
  }

  isSetOn(data: MenuData): boolean {
    return this.values.has(data);
  }
}

export class MenuData {
  get<T>(key: DataKey<T>): T | undefined {
    return key.read(this);
  }

  set<T>(key: DataKey<T>, value: T): this {
    key.write(this, value);
    return this;
  }

  has<T>(key: DataKey<T>): boolean {
    return key.isSetOn(this);
  }

  getOrInsert<T>(key: DataKey<T>, init: () => T): T {
    if (key.isSetOn(this)) {
      const existing = key.read(this);
      if (existing !== undefined) return existing;
    }
    const value = init();
    key.write(this, value);
    return value;
  }
}
