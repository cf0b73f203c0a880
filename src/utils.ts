export function assertNotNull<V>(value: V | null | undefined): asserts value is V {
  if (value == null) {
    throw new Error(`Value is asserted to be not null, but it is ${value}.`);
  }
}

export const checkNotNull = <V>(value: V | null | undefined): V => {
  assertNotNull(value);
  return value;
};

export const zip = <A, B>(
  list1: readonly A[],
  list2: readonly B[]
): readonly (readonly [A, B])[] => {
  const length = Math.min(list1.length, list2.length);
  const result: (readonly [A, B])[] = [];
  for (let i = 0; i < length; i += 1) {
    result.push([checkNotNull(list1[i]), checkNotNull(list2[i])]);
  }
  return result;
};
