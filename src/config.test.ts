import path from "node:path";
import { getConfig, normalizeDomain } from "./config";
import { ConfigurationError } from "./errors";

const jiraEnv = {
  OPENAI_API_KEY: "test-openai-key",
  JIRA_EMAIL: "dev@example.com",
  JIRA_API_TOKEN: "test-token",
  JIRA_DOMAIN: "https://team.atlassian.net/",
  JIRA_PROJECT: "AL",
};

describe("getConfig", () => {
  test("ask needs only the embedding credential and applies defaults", () => {
    const config = getConfig("ask", { env: { OPENAI_API_KEY: "test-openai-key" } });

    expect(config.TOP_K).toBe(5);
    expect(config.RETRIEVAL_MODE).toBe("similarity");
    expect(config.EMBEDDING_MODEL).toBe("text-embedding-3-small");
    expect(config.COMPLETION_MODEL).toBe("gpt-4o-mini");
    expect(config.CONTEXT_CHAR_BUDGET).toBe(12_000);
    expect(config.RETRY_ATTEMPTS).toBe(3);
    expect(config.INDEX_STORE_PATH).toBe(path.resolve("jira-index.json"));
    expect(config.VERBOSE).toBe(false);
  });

  test("init lists every missing required value in one error", () => {
    const call = () => getConfig("init", { env: {} });

    expect(call).toThrow(ConfigurationError);
    expect(call).toThrow(
      [
        "Invalid configuration:",
        "  - OPENAI_API_KEY is required",
        "  - JIRA_EMAIL is required",
        "  - JIRA_API_TOKEN is required",
        "  - JIRA_DOMAIN is required",
        "  - JIRA_PROJECT (or JIRA_JQL) is required",
      ].join("\n"),
    );
  });

  test("init derives the JQL from the project and normalizes the domain", () => {
    const config = getConfig("init", { env: jiraEnv });

    expect(config.JIRA_DOMAIN).toBe("team.atlassian.net");
    expect(config.JIRA_JQL).toBe('project = "AL"');
    expect(config.JIRA_PAGE_SIZE).toBe(100);
    expect(config.JIRA_MAX_ISSUES).toBe(0);
    expect(config.EMBEDDING_MAX_CHARS).toBe(20_000);
    expect(config.JIRA_INCLUDE_COMMENTS).toBe(true);
  });

  test("an explicit JQL wins over the project", () => {
    const config = getConfig("init", {
      env: { ...jiraEnv, JIRA_JQL: "project = AL AND status != Done" },
    });
    expect(config.JIRA_JQL).toBe("project = AL AND status != Done");
  });

  test("offline init does not require tracker credentials", () => {
    const config = getConfig("init", { env: { OPENAI_API_KEY: "test-openai-key" }, offline: true });
    expect(config.JIRA_EMAIL).toBe("");
    expect(config.JIRA_JQL).toBe("");
  });

  test("rejects malformed numbers and unknown retrieval modes", () => {
    expect(() =>
      getConfig("ask", {
        env: { OPENAI_API_KEY: "test-openai-key", TOP_K: "abc", RETRIEVAL_MODE: "fuzzy" },
      }),
    ).toThrow(
      'Invalid configuration:\n  - RETRIEVAL_MODE must be "similarity" or "mmr" (got "fuzzy")\n  - TOP_K must be a number (got "abc")',
    );
  });

  test("clamps out-of-range integers and parses booleans tolerantly", () => {
    const config = getConfig("init", {
      env: { ...jiraEnv, JIRA_PAGE_SIZE: "5000", JIRA_INCLUDE_COMMENTS: "off", VERBOSE: "yes" },
    });
    expect(config.JIRA_PAGE_SIZE).toBe(1000);
    expect(config.JIRA_INCLUDE_COMMENTS).toBe(false);
    expect(config.VERBOSE).toBe(true);
  });
});

describe("normalizeDomain", () => {
  test("strips scheme and trailing slashes", () => {
    expect(normalizeDomain("https://team.atlassian.net//")).toBe("team.atlassian.net");
    expect(normalizeDomain("team.atlassian.net")).toBe("team.atlassian.net");
  });
});
