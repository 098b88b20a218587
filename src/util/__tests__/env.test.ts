import {
  getBoolean,
  getEnvVar,
  getList,
  getNumber,
  getRequiredString,
  getStage,
  getString,
  isProduction,
  isTest,
} from "../env";

describe("env utils", () => {
  const originalEnv = process.env;
  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env.APP_STAGE;
    delete process.env.STAGE;
  });
  afterAll(() => {
    process.env = originalEnv;
  });

  test("stage resolution with APP_STAGE", () => {
    process.env.APP_STAGE = "prod";
    expect(getStage()).toBe("prod");
    expect(isProduction()).toBe(true);
  });

  test("stage fallback to NODE_ENV", () => {
    process.env.NODE_ENV = "production";
    expect(getStage()).toBe("prod");
    process.env.NODE_ENV = "test";
    expect(getStage()).toBe("test");
    process.env.NODE_ENV = "development";
    expect(getStage()).toBe("dev");
  });

  test("isTest is true under jest", () => {
    expect(isTest()).toBe(true);
  });

  test("getEnvVar returns default when missing", () => {
    const value = getEnvVar("UNKNOWN_VAR", { defaultValue: "abc" });
    expect(value).toBe("abc");
  });

  test("getEnvVar stageAware picks staged value first", () => {
    process.env.APP_STAGE = "dev";
    process.env.MY_KEY__dev = "staged";
    process.env.MY_KEY = "plain";
    expect(getEnvVar("MY_KEY")).toBe("staged");
    expect(getEnvVar("MY_KEY", { stageAware: false })).toBe("plain");
  });

  test("empty values count as missing", () => {
    process.env.EMPTY_KEY = "";
    expect(getString("EMPTY_KEY", "fallback")).toBe("fallback");
  });

  test("parsers: number and boolean", () => {
    process.env.NUMBER_KEY = "42";
    process.env.BOOL_KEY = "true";
    process.env.BAD_NUMBER = "forty";
    expect(getNumber("NUMBER_KEY")).toBe(42);
    expect(getBoolean("BOOL_KEY")).toBe(true);
    expect(() => getNumber("BAD_NUMBER", 1)).toThrow(
      "Env var BAD_NUMBER is not a number: forty"
    );
  });

  test("getString returns default", () => {
    expect(getString("NOPE", "x")).toBe("x");
    expect(getString("NOPE")).toBeUndefined();
  });

  test("getRequiredString names both keys it tried", () => {
    process.env.APP_STAGE = "dev";
    delete process.env.NEWS_API_KEY;
    delete process.env.NEWS_API_KEY__dev;
    expect(() => getRequiredString("NEWS_API_KEY")).toThrow(
      "Missing required env var: NEWS_API_KEY__dev or NEWS_API_KEY"
    );
  });

  test("getList splits on commas and pipes", () => {
    process.env.TICKERS = "AAPL, msft|  |NVDA";
    expect(getList("TICKERS", ["X"])).toEqual(["AAPL", "msft", "NVDA"]);
    expect(getList("MISSING_LIST", ["X"])).toEqual(["X"]);
  });
});
