import {
  AxiosError,
  type AxiosAdapter,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
} from "axios";
import { getConfig } from "./config";
import { ConfigurationError, SourceUnavailable } from "./errors";
import { JiraSource, type JiraSourceOptions } from "./jira";
import { noSleep } from "./test-helpers";

type Reply = { status: number; data?: unknown } | "network-error";

/** In-process axios transport: routes each request to `handler` and records it. */
function fakeJira(handler: (config: InternalAxiosRequestConfig) => Reply | Promise<Reply>) {
  const requests: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (config) => {
    requests.push(config);
    const reply = await handler(config);
    if (reply === "network-error") {
      throw new AxiosError("connect ECONNREFUSED", "ECONNREFUSED", config);
    }
    const response: AxiosResponse = {
      data: reply.data,
      status: reply.status,
      statusText: String(reply.status),
      headers: {},
      config,
    };
    if (reply.status >= 400) {
      throw new AxiosError(
        `Request failed with status code ${reply.status}`,
        AxiosError.ERR_BAD_RESPONSE,
        config,
        null,
        response,
      );
    }
    return response;
  };
  return { adapter, requests };
}

function source(adapter: AxiosAdapter, opts: Partial<JiraSourceOptions> = {}): JiraSource {
  return new JiraSource({
    domain: "team.atlassian.net",
    email: "dev@example.com",
    apiToken: "test-token",
    includeComments: false,
    adapter,
    sleep: noSleep,
    ...opts,
  });
}

function rawIssue(key: string, summary: string, assignee?: string) {
  return {
    key,
    fields: {
      summary,
      description: {
        type: "doc",
        content: [{ type: "paragraph", content: [{ type: "text", text: `About ${key}` }] }],
      },
      status: { name: "In Progress" },
      assignee: assignee ? { displayName: assignee } : null,
      creator: { displayName: "Sam" },
      created: "2024-01-02T10:00:00.000+0000",
      updated: "2024-01-03T10:00:00.000+0000",
      issuelinks: [{ outwardIssue: { key: "A-9" } }, { inwardIssue: { key: "A-7" } }],
    },
  };
}

describe("JiraSource.fetchAllIssues", () => {
  test("follows nextPageToken until the last page", async () => {
    const { adapter, requests } = fakeJira((config) => {
      if (!config.params?.nextPageToken) {
        return {
          status: 200,
          data: {
            issues: [rawIssue("A-1", "Fix login bug", "Kix"), rawIssue("A-2", "Write docs")],
            nextPageToken: "page-2",
            isLast: false,
          },
        };
      }
      return { status: 200, data: { issues: [rawIssue("A-3", "Ship release")], isLast: true } };
    });

    const issues = await source(adapter, { pageSize: 2 }).fetchAllIssues('project = "A"');

    expect(issues.map((i) => i.key)).toEqual(["A-1", "A-2", "A-3"]);
    expect(requests).toHaveLength(2);
    expect(requests[0].url).toBe("/rest/api/3/search/jql");
    expect(requests[0].baseURL).toBe("https://team.atlassian.net");
    expect(requests[0].auth).toEqual({ username: "dev@example.com", password: "test-token" });
    expect(requests[0].params).toEqual({
      jql: 'project = "A"',
      maxResults: 2,
      fields: "summary,description,status,assignee,creator,created,updated,issuelinks",
    });
    expect(requests[1].params.nextPageToken).toBe("page-2");
  });

  test("maps REST fields onto issues", async () => {
    const { adapter } = fakeJira(() => ({
      status: 200,
      data: { issues: [rawIssue("A-1", "Fix login bug", "Kix"), rawIssue("A-2", "Write docs")] },
    }));

    const [first, second] = await source(adapter).fetchAllIssues("project = A");

    expect(first).toEqual({
      key: "A-1",
      summary: "Fix login bug",
      description: "About A-1",
      status: "In Progress",
      assignee: "Kix",
      creator: "Sam",
      created: "2024-01-02T10:00:00.000+0000",
      updated: "2024-01-03T10:00:00.000+0000",
      relatedIssues: ["A-9"],
      comments: [],
    });
    expect(second.assignee).toBeNull();
  });

  test("with default settings, pages through every matching issue", async () => {
    const config = getConfig("init", {
      env: {
        OPENAI_API_KEY: "test-key",
        JIRA_EMAIL: "dev@example.com",
        JIRA_API_TOKEN: "test-token",
        JIRA_DOMAIN: "team.atlassian.net",
        JIRA_PROJECT: "A",
        JIRA_INCLUDE_COMMENTS: "false",
      },
    });
    const { adapter, requests } = fakeJira((request) => {
      const page = Number(request.params?.nextPageToken ?? 0);
      const issues = Array.from({ length: 100 }, (_, i) => {
        const n = page * 100 + i + 1;
        return rawIssue(`A-${n}`, `Issue ${n}`);
      });
      return {
        status: 200,
        data: page < 14 ? { issues, nextPageToken: String(page + 1) } : { issues, isLast: true },
      };
    });

    const issues = await source(adapter, {
      pageSize: config.JIRA_PAGE_SIZE,
      maxIssues: config.JIRA_MAX_ISSUES,
      includeComments: config.JIRA_INCLUDE_COMMENTS,
    }).fetchAllIssues(config.JIRA_JQL);

    expect(issues).toHaveLength(1500);
    expect(issues[1499].key).toBe("A-1500");
    expect(requests).toHaveLength(15);
  });

  test("an explicit issue limit stops paging and warns", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const { adapter, requests } = fakeJira(() => ({
      status: 200,
      data: {
        issues: [rawIssue("A-1", "one"), rawIssue("A-2", "two"), rawIssue("A-3", "three")],
        nextPageToken: "more",
      },
    }));

    const issues = await source(adapter, { maxIssues: 2 }).fetchAllIssues("project = A");

    expect(issues.map((i) => i.key)).toEqual(["A-1", "A-2"]);
    expect(requests).toHaveLength(1);
    expect(error.mock.calls).toEqual([
      ["[jira-qa] Issue limit of 2 reached; remaining matching issues are not indexed."],
      ["[jira-qa] Fetched 2 issues from team.atlassian.net..."],
    ]);
  });

  test("a limit equal to the last page does not warn", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const { adapter } = fakeJira(() => ({
      status: 200,
      data: { issues: [rawIssue("A-1", "one"), rawIssue("A-2", "two")], isLast: true },
    }));

    await source(adapter, { maxIssues: 2 }).fetchAllIssues("project = A");

    expect(error.mock.calls).toEqual([["[jira-qa] Fetched 2 issues from team.atlassian.net..."]]);
  });

  test("an empty first page yields no issues", async () => {
    const { adapter } = fakeJira(() => ({ status: 200, data: { issues: [], isLast: true } }));
    await expect(source(adapter).fetchAllIssues("project = A")).resolves.toEqual([]);
  });

  test("fetches comments concurrently but keeps issue order", async () => {
    const { adapter } = fakeJira(async (config) => {
      if (config.url === "/rest/api/3/search/jql") {
        return {
          status: 200,
          data: { issues: [rawIssue("A-1", "Fix login bug"), rawIssue("A-2", "Write docs")] },
        };
      }
      if (config.url === "/rest/api/3/issue/A-1/comment") {
        // Slowest reply first, so A-2 finishes before A-1.
        await new Promise((resolve) => setTimeout(resolve, 20));
        return {
          status: 200,
          data: {
            comments: [
              {
                author: { displayName: "Sam" },
                body: {
                  type: "doc",
                  content: [{ type: "paragraph", content: [{ type: "text", text: "Repro on Safari" }] }],
                },
              },
            ],
            total: 1,
          },
        };
      }
      return { status: 200, data: { comments: [], total: 0 } };
    });

    const issues = await source(adapter, { includeComments: true, concurrency: 2 }).fetchAllIssues(
      "project = A",
    );

    expect(issues.map((i) => i.key)).toEqual(["A-1", "A-2"]);
    expect(issues[0].comments).toEqual([{ author: "Sam", body: "Repro on Safari" }]);
    expect(issues[1].comments).toEqual([]);
  });
});

describe("JiraSource error handling", () => {
  test("rejected credentials fail immediately with SourceUnavailable", async () => {
    const { adapter, requests } = fakeJira(() => ({
      status: 401,
      data: { errorMessages: ["Unauthorized"] },
    }));

    const attempt = source(adapter).fetchAllIssues("project = A");

    await expect(attempt).rejects.toBeInstanceOf(SourceUnavailable);
    await expect(attempt).rejects.toThrow(
      "JIRA rejected the credentials for team.atlassian.net (HTTP 401). Check JIRA_EMAIL and JIRA_API_TOKEN.",
    );
    expect(requests).toHaveLength(1);
  });

  test("retries server errors and then succeeds", async () => {
    let calls = 0;
    const { adapter, requests } = fakeJira(() => {
      calls++;
      if (calls <= 2) return { status: 503 };
      return { status: 200, data: { issues: [rawIssue("A-1", "Fix login bug")] } };
    });

    const issues = await source(adapter, { retryAttempts: 3 }).fetchAllIssues("project = A");

    expect(issues).toHaveLength(1);
    expect(requests).toHaveLength(3);
  });

  test("gives up on an unreachable host after the retry budget", async () => {
    const { adapter, requests } = fakeJira(() => "network-error");

    const attempt = source(adapter, { retryAttempts: 3 }).fetchAllIssues("project = A");

    await expect(attempt).rejects.toBeInstanceOf(SourceUnavailable);
    await expect(attempt).rejects.toThrow(
      "JIRA at team.atlassian.net is unavailable: connect ECONNREFUSED",
    );
    expect(requests).toHaveLength(3);
  });

  test("a rejected query is a configuration error", async () => {
    const { adapter } = fakeJira(() => ({
      status: 400,
      data: { errorMessages: ["The value 'NOPE' does not exist for the field 'project'."] },
    }));

    await expect(source(adapter).fetchAllIssues("project = NOPE")).rejects.toThrow(
      new ConfigurationError(
        "JIRA rejected the query: The value 'NOPE' does not exist for the field 'project'.",
      ),
    );
  });
});
