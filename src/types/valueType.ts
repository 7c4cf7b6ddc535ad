export type EnumMembers = Readonly<Record<string, string | number>>;

interface ScalarHandle {
  readonly kind: "scalar";
  readonly name: string;
}

interface EnumHandle {
  readonly kind: "enum";
  readonly name: string;
  readonly members: EnumMembers;
}

interface ArrayHandle {
  readonly kind: "array";
  readonly element: ValueType;
}

interface NullableHandle {
  readonly kind: "nullable";
  readonly inner: ValueType;
}

/**
 * Runtime handle for a parameter type. Handles are compared by identity, so
 * each scalar or enum type must be defined once and shared.
 * `T` exists only at compile time and types the converter bound to the handle.
 */
export type ValueType<T = unknown> = (ScalarHandle | EnumHandle | ArrayHandle | NullableHandle) & {
  readonly __value?: T;
};

export function defineValueType<T>(name: string): ValueType<T> {
  const handle: ValueType<T> = { kind: "scalar", name };
  return Object.freeze(handle);
}

/**
 * Accepts a plain member record or a TypeScript `enum` object. The reverse
 * mappings a numeric enum carries at run time (`"0": "Low"`) are dropped.
 */
export function enumType<M extends EnumMembers>(name: string, members: M): ValueType<M[keyof M]> {
  const handle: ValueType<M[keyof M]> = { kind: "enum", name, members: declaredMembers(members) };
  return Object.freeze(handle);
}

function declaredMembers(members: EnumMembers): EnumMembers {
  const declared = Object.entries(members).filter(([key, value]) => {
    if (typeof value !== "string") return true;
    const target = members[value];
    return !(typeof target === "number" && String(target) === key);
  });
  return Object.freeze(Object.fromEntries(declared));
}

export function arrayOf<T>(element: ValueType<T>): ValueType<T[]> {
  const handle: ValueType<T[]> = { kind: "array", element };
  return Object.freeze(handle);
}

export function nullable<T>(inner: ValueType<T>): ValueType<T | null> {
  const handle: ValueType<T | null> = { kind: "nullable", inner };
  return Object.freeze(handle);
}

export const ValueTypes = Object.freeze({
  String: defineValueType<string>("String"),
  Integer: defineValueType<number>("Integer"),
  Number: defineValueType<number>("Number"),
  Boolean: defineValueType<boolean>("Boolean"),
  BigInt: defineValueType<bigint>("BigInt"),
  /** Shared registry key for every enum type. */
  Enum: defineValueType<string | number>("Enum"),
});

export function describeType(type: ValueType): string {
  switch (type.kind) {
    case "scalar":
    case "enum":
      return type.name;
    case "array":
      return `${describeType(type.element)}[]`;
    case "nullable":
      return `${describeType(type.inner)}?`;
  }
}

export function isValueType(value: unknown): value is ValueType {
  if (typeof value !== "object" || value === null || !("kind" in value)) return false;
  switch (value.kind) {
    case "scalar":
      return "name" in value && typeof value.name === "string";
    case "enum":
      return "members" in value && typeof value.members === "object" && value.members !== null;
    case "array":
      return "element" in value && isValueType(value.element);
    case "nullable":
      return "inner" in value && isValueType(value.inner);
    default:
      return false;
  }
}
