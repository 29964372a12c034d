import { requestMatcher, responseMatcher } from "@/browser/network";

const requestEvent = {
  requestId: "request-1",
  frameId: "frame-1",
  type: "Document",
  request: { url: "http://localhost:8907/empty.html", method: "GET", headers: {} },
};

const responseEvent = {
  requestId: "request-1",
  type: "Document",
  response: { url: "http://localhost:8907/empty.html", status: 200 },
};

describe("requestMatcher", () => {
  it("matches an exact URL", () => {
    expect(requestMatcher("http://localhost:8907/empty.html")(requestEvent)).toEqual({
      requestId: "request-1",
      url: "http://localhost:8907/empty.html",
      method: "GET",
      frameId: "frame-1",
      resourceType: "Document",
    });
    expect(requestMatcher("http://localhost:8907/other.html")(requestEvent)).toBeUndefined();
  });

  it("matches a URL pattern or a predicate", () => {
    expect(requestMatcher(/empty\.html$/)(requestEvent)?.requestId).toBe("request-1");
    expect(requestMatcher((request) => request.method === "POST")(requestEvent)).toBeUndefined();
  });

  it("skips events it cannot parse", () => {
    expect(requestMatcher(() => true)({ requestId: 3 })).toBeUndefined();
    expect(requestMatcher(() => true)(undefined)).toBeUndefined();
  });
});

describe("responseMatcher", () => {
  it("defaults a missing status text to an empty string", () => {
    expect(responseMatcher((response) => response.status === 200)(responseEvent)).toEqual({
      requestId: "request-1",
      url: "http://localhost:8907/empty.html",
      status: 200,
      statusText: "",
      frameId: undefined,
      resourceType: "Document",
    });
  });
});
