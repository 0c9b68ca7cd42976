export interface NameResolver {
  resolve(rawName: string): string;
}

// Exact, case-sensitive lookup; unmapped names pass through unchanged
export function createNameResolver(mapping: Readonly<Record<string, string>>): NameResolver {
  const names = new Map(Object.entries(mapping));
  return {
    resolve: (rawName) => names.get(rawName) ?? rawName,
  };
}
