import { describe, it, expect } from "vitest";
import { AttributeMap } from "../profile-map";
import { buildResult, isResultFilled, toWireResult } from "../result";

function profile(name: string, image: string, pairs: Array<[string, string]> = []) {
  const info = new AttributeMap();
  for (const [k, v] of pairs) info.insert(k, v);
  return { name, image, info };
}

describe("buildResult", () => {
  it("uses the resolved name as keyword and freezes the record", () => {
    const result = buildResult("123", "https://site.example/p?os=123", profile("Jane Doe", ""), "NAVER");

    expect(result).toEqual({
      os: "123",
      osSource: "NAVER",
      profileUrl: "https://site.example/p?os=123",
      keyword: "Jane Doe",
      name: "Jane Doe",
      image: "",
      info: {},
    });
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.info)).toBe(true);
  });
});

describe("isResultFilled", () => {
  it("needs a name, an image or at least one info entry", () => {
    expect(isResultFilled(null)).toBe(false);
    expect(isResultFilled(buildResult("1", "u", profile("", ""), "NAVER"))).toBe(false);
    expect(isResultFilled(buildResult("1", "u", profile("", "https://img.example/a.jpg"), "NAVER"))).toBe(true);
    expect(isResultFilled(buildResult("1", "u", profile("", "", [["Born", "1990"]]), "NAVER"))).toBe(true);
  });
});

describe("toWireResult", () => {
  it("keeps info as a nested map under the legacy field names", () => {
    const result = buildResult(
      "999",
      "https://site.example/p?os=999",
      profile("", "https://img.example/a.jpg", [
        ["Height", "170cm"],
        ["Born", "1990"],
      ]),
      "NAVER"
    );

    expect(toWireResult(result)).toEqual({
      os: "999",
      osSource: "NAVER",
      profileUrl: "https://site.example/p?os=999",
      keyword: "",
      naverName: "",
      naverImage: "https://img.example/a.jpg",
      naverInfo: { Height: "170cm", Born: "1990" },
    });
    expect(Object.keys(toWireResult(result).naverInfo)).toEqual(["Height", "Born"]);
  });
});
