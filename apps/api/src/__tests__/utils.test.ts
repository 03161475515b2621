/**
 * @dimsum/shared yardimci fonksiyon testleri
 */

import { describe, it, expect } from "vitest";
import { escapeLikePattern, toCalendarDate } from "@dimsum/shared";

describe("toCalendarDate", () => {
  it("YYYY-MM-DD bicimini aynen doner", () => {
    expect(toCalendarDate("2024-03-15")).toBe("2024-03-15");
  });

  it("saat ve saat dilimi bilgisini atar", () => {
    expect(toCalendarDate("2024-03-15T18:45:00")).toBe("2024-03-15");
    expect(toCalendarDate("2024-03-15 18:45:00.123456+08:00")).toBe("2024-03-15");
    expect(toCalendarDate("2024-03-15T18:45Z")).toBe("2024-03-15");
  });

  it("bas ve sondaki bosluklari yok sayar", () => {
    expect(toCalendarDate(" 2024-03-15 ")).toBe("2024-03-15");
  });

  it("artik yil kontrolu yapar", () => {
    expect(toCalendarDate("2024-02-29")).toBe("2024-02-29");
    expect(toCalendarDate("2023-02-29")).toBeNull();
  });

  it("gecersiz bicim ve degerler icin null doner", () => {
    expect(toCalendarDate("15/03/2024")).toBeNull();
    expect(toCalendarDate("2024-13-01")).toBeNull();
    expect(toCalendarDate("2024-04-31")).toBeNull();
    expect(toCalendarDate("2024-03-15T25:00")).toBeNull();
    expect(toCalendarDate("dun")).toBeNull();
  });
});

describe("escapeLikePattern", () => {
  it("LIKE ozel karakterlerini kacirir", () => {
    expect(escapeLikePattern("50%_off\\")).toBe("50\\%\\_off\\\\");
    expect(escapeLikePattern("har gow")).toBe("har gow");
  });
});
