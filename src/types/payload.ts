/**
 * Payload value model — heterogeneous key/value input handed to feature builders.
 */

export type PayloadValue =
  | { readonly kind: "number"; readonly value: number }
  | { readonly kind: "text"; readonly value: string }
  | { readonly kind: "boolean"; readonly value: boolean }
  | { readonly kind: "list"; readonly items: readonly string[] };

export type PayloadKind = PayloadValue["kind"];

export type Payload = Readonly<Record<string, PayloadValue>>;

export type FeatureVector = readonly number[];

// ── Constructors ─────────────────────────────────────────────────────────

export function num(value: number): PayloadValue {
  return { kind: "number", value };
}

export function text(value: string): PayloadValue {
  return { kind: "text", value };
}

export function bool(value: boolean): PayloadValue {
  return { kind: "boolean", value };
}

export function list(items: readonly string[]): PayloadValue {
  return { kind: "list", items: [...items] };
}

/**
 * Convert a plain JSON-like object into a Payload.
 * Arrays keep their primitive members as strings; nested objects and nulls are dropped.
 */
export function toPayload(plain: Readonly<Record<string, unknown>>): Payload {
  const payload: Record<string, PayloadValue> = {};

  for (const [key, raw] of Object.entries(plain)) {
    const value = toPayloadValue(raw);
    if (value) {
      payload[key] = value;
    }
  }

  return payload;
}

function toPayloadValue(raw: unknown): PayloadValue | undefined {
  switch (typeof raw) {
    case "number":
      return num(raw);
    case "string":
      return text(raw);
    case "boolean":
      return bool(raw);
    default:
      break;
  }

  if (Array.isArray(raw)) {
    const items: string[] = [];
    for (const item of raw) {
      if (typeof item === "string" || typeof item === "number" || typeof item === "boolean") {
        items.push(String(item));
      }
    }
    return list(items);
  }

  return undefined;
}
