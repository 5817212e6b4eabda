import { z } from 'zod';

type ViewShape = Record<string, z.ZodTypeAny>;

/**
 * Typed accessor over the string-to-string state bag. String fields are
 * stored as-is; everything else as JSON. Unreadable entries read as absent.
 */
export class StateView<S extends ViewShape> {
  constructor(private readonly shape: S) {}

  get<K extends keyof S & string>(data: Record<string, string>, key: K): z.infer<S[K]> | undefined {
    const raw = data[key];
    if (raw === undefined) return undefined;

    const schema = this.shape[key];
    const direct = schema.safeParse(raw);
    if (direct.success) return direct.data;

    try {
      const decoded = schema.safeParse(JSON.parse(raw));
      return decoded.success ? decoded.data : undefined;
    } catch {
      return undefined;
    }
  }

  set<K extends keyof S & string>(data: Record<string, string>, key: K, value: z.infer<S[K]>): void {
    const parsed = this.shape[key].parse(value);
    data[key] = typeof parsed === 'string' ? parsed : JSON.stringify(parsed);
  }

  delete<K extends keyof S & string>(data: Record<string, string>, key: K): void {
    delete data[key];
  }

  has<K extends keyof S & string>(data: Record<string, string>, key: K): boolean {
    return this.get(data, key) !== undefined;
  }
}

export function defineStateView<S extends ViewShape>(shape: S): StateView<S> {
  return new StateView(shape);
}
