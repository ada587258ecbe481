import { describe, it, expect } from "vitest";

import { isValidCidr } from "../../../src/utils/cidr.js";

describe("utils/cidr", () => {
  it.each(["10.0.0.0/24", "192.0.2.0/32", "10.1.2.3", "fd00::/64", " 10.0.0.0/8 "])(
    "should accept %s",
    (value) => {
      expect(isValidCidr(value)).toBe(true);
    }
  );

  it.each([
    "",
    "10.0.0.0/33",
    "fd00::/129",
    "10.0.0/24",
    "10.0.0.0/",
    "10.0.0.0/24/1",
    "10.0.0.0/-1",
    "ocp4-a",
  ])("should reject %s", (value) => {
    expect(isValidCidr(value)).toBe(false);
  });
});
