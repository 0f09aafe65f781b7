import { describe, it, expect } from "vitest";
import { toCsv } from "../save";

describe("toCsv", () => {
  it("writes nested maps as one JSON-encoded cell", () => {
    const csv = toCsv([{ os: "999", naverName: "", naverInfo: { Height: "170cm" } }]);

    expect(csv).toBe('"os","naverName","naverInfo"\r\n"999","","{""Height"":""170cm""}"');
  });
});
