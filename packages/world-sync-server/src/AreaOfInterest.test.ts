import { isWithinRadius } from "./AreaOfInterest";

const origin = { x: 0, y: 0, z: 0 };

describe("isWithinRadius", () => {
  test("includes points inside and on the sphere", () => {
    expect(isWithinRadius(origin, 10, { x: 5, y: 0, z: 0 })).toBe(true);
    expect(isWithinRadius(origin, 10, { x: 10, y: 0, z: 0 })).toBe(true);
    expect(isWithinRadius(origin, 10, { x: 6, y: -8, z: 0 })).toBe(true);
    expect(isWithinRadius(origin, 0, origin)).toBe(true);
  });

  test("excludes points outside the sphere even within the bounding cube", () => {
    expect(isWithinRadius(origin, 10, { x: 20, y: 0, z: 0 })).toBe(false);
    expect(isWithinRadius(origin, 10, { x: 8, y: 8, z: 0 })).toBe(false);
    expect(isWithinRadius(origin, 10, { x: 6, y: 6, z: 6 })).toBe(false);
  });

  test("measures from the interest center rather than the origin", () => {
    const center = { x: 100, y: -50, z: 7 };
    expect(isWithinRadius(center, 3, { x: 102, y: -52, z: 8 })).toBe(true);
    expect(isWithinRadius(center, 3, { x: 0, y: 0, z: 0 })).toBe(false);
  });

  test("stays exact at the extremes of the coordinate range", () => {
    const far = { x: -2147483648, y: -2147483648, z: -2147483648 };
    expect(isWithinRadius(far, 65535, { x: 2147483647, y: 2147483647, z: 2147483647 })).toBe(
      false,
    );
    expect(isWithinRadius(far, 65535, { x: -2147483648 + 65535, y: -2147483648, z: -2147483648 })).toBe(
      true,
    );
    expect(
      isWithinRadius(far, 65535, { x: -2147483648 + 65535, y: -2147483648 + 1, z: -2147483648 }),
    ).toBe(false);
  });
});
