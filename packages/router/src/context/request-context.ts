/**
 * Key-value store scoped to a single request.
 *
 * The router hands it to the handler alongside the request and clears it once the
 * handler settles, unless the router was created with `keepContext`.
 */
export class RequestContext {
  private readonly values = new Map<string | symbol, unknown>();

  get size() {
    return this.values.size;
  }

  get<TValue>(key: string | symbol): TValue | undefined {
    return this.values.get(key) as TValue | undefined;
  }

  set<TValue>(key: string | symbol, value: TValue) {
    this.values.set(key, value);

    return this;
  }

  has(key: string | symbol) {
    return this.values.has(key);
  }

  delete(key: string | symbol) {
    return this.values.delete(key);
  }

  clear() {
    this.values.clear();
  }
}
