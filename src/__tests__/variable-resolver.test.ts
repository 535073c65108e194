import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigError } from "../errors";
import {
  VariableResolver,
  extractRequestVariables,
  extractVariableNames,
  getVariableValue,
  loadEnvFile,
  selectVariableOption,
  validateVariableValue,
} from "../variable-resolver";

describe("VariableResolver", () => {
  it("prefers cli over session over profile", async () => {
    const scopes = {
      profileVars: { name: "profile" },
      sessionVars: { name: "session" },
      cliVars: { name: "cli" },
    };
    expect(await new VariableResolver(scopes).resolve("{{name}}")).toBe("cli");
    expect(await new VariableResolver({ ...scopes, cliVars: {} }).resolve("{{name}}")).toBe("session");
    expect(await new VariableResolver({ profileVars: scopes.profileVars }).resolve("{{name}}")).toBe("profile");
  });

  it("reads env placeholders only from the env scope", async () => {
    const resolver = new VariableResolver({
      envVars: { API_KEY: "test-secret" },
      cliVars: { "env.API_KEY": "shadow" },
    });

    expect(await resolver.resolve("key={{env.API_KEY}}")).toBe("key=test-secret");
    expect(await resolver.resolve("{{API_KEY}}")).toBe("{{API_KEY}}");
    expect(resolver.getUnresolvedVariables()).toEqual(["API_KEY"]);
  });

  it("trims whitespace inside braces", async () => {
    const resolver = new VariableResolver({ cliVars: { host: "localhost" } });
    expect(await resolver.resolve("http://{{ host }}/")).toBe("http://localhost/");
  });

  it("uses the active option of a multi-value variable", async () => {
    const resolver = new VariableResolver({
      profileVars: { env: { options: ["dev", "staging", "prod"], active: 2 } },
    });
    expect(await resolver.resolve("{{env}}")).toBe("prod");
  });

  it("leaves unknown placeholders in place and records them once", async () => {
    const resolver = new VariableResolver();
    expect(await resolver.resolve("{{a}}/{{a}}/{{b}}")).toBe("{{a}}/{{a}}/{{b}}");
    expect(resolver.getUnresolvedVariables()).toEqual(["a", "b"]);
  });

  it("does not match inherited object properties", async () => {
    const resolver = new VariableResolver();
    expect(await resolver.resolve("{{constructor}}")).toBe("{{constructor}}");
  });

  it("substitutes shell command output", async () => {
    const resolver = new VariableResolver();
    expect(await resolver.resolve("$(echo hello) world")).toBe("hello world");
  });

  it("runs commands stored in variable values", async () => {
    const resolver = new VariableResolver({ profileVars: { greeting: "$(echo hi)" } });
    expect(await resolver.resolve("{{greeting}}!")).toBe("hi!");
  });

  it("resolves already resolved text to itself", async () => {
    const resolver = new VariableResolver({ cliVars: { user: "ada" } });
    const once = await resolver.resolve("/users/{{user}}");
    expect(await resolver.resolve(once)).toBe(once);
  });

  it("keeps a failing command literally and records the error", async () => {
    const resolver = new VariableResolver();
    expect(await resolver.resolve("x=$(echo oops >&2; exit 1)")).toBe("x=$(echo oops >&2; exit 1)");
    expect(resolver.getShellErrors()).toEqual(["$(echo oops >&2; exit 1): oops"]);
  });

  it("records a failing command without stderr", async () => {
    const resolver = new VariableResolver();
    expect(await resolver.resolve("$(exit 3)")).toBe("$(exit 3)");
    const errors = resolver.getShellErrors();
    expect(errors).toHaveLength(1);
    expect(errors[0].startsWith("$(exit 3): ")).toBe(true);
  });

  it("resolves url, headers and body of a request", async () => {
    const resolver = new VariableResolver({ cliVars: { host: "localhost:8080", token: "test-secret", id: "7" } });
    const resolved = await resolver.resolveRequest({
      method: "POST",
      url: "http://{{host}}/items",
      headers: { Authorization: "Bearer {{token}}" },
      body: '{"id":{{id}}}',
    });

    expect(resolved).toEqual({
      method: "POST",
      url: "http://localhost:8080/items",
      headers: { Authorization: "Bearer test-secret" },
      body: '{"id":7}',
    });
  });

  it("returns a copy of the session variables", () => {
    const resolver = new VariableResolver();
    resolver.addSessionVariable("token", "test-secret");

    const copy = resolver.getSessionVariables();
    copy.token = "changed";
    expect(resolver.getSessionVariables()).toEqual({ token: "test-secret" });
  });
});

describe("variable helpers", () => {
  it("extracts unique names in first-seen order", () => {
    expect(extractVariableNames("{{a}}/{{ b }}/{{a}}")).toEqual(["a", "b"]);
  });

  it("extracts names across a whole request", () => {
    expect(
      extractRequestVariables({
        method: "GET",
        url: "{{base}}/users",
        headers: { Authorization: "{{token}}", "X-Base": "{{base}}" },
        body: "{{payload}}",
      })
    ).toEqual(["base", "token", "payload"]);
  });

  it("reads plain and multi-value variables", () => {
    expect(getVariableValue("plain")).toBe("plain");
    expect(getVariableValue({ options: ["a", "b"], active: 1 })).toBe("b");
    expect(getVariableValue({ options: ["a"], active: 4 })).toBe("");
  });

  it("describes unusable multi-value variables", () => {
    expect(validateVariableValue("env", "dev")).toBeUndefined();
    expect(validateVariableValue("env", { options: [], active: 0 })).toBe("variable 'env': multi-value variable has no options");
    expect(validateVariableValue("env", { options: ["a"], active: -1 })).toBe("variable 'env': active index -1 is negative");
  });

  it("selects options by index or alias", () => {
    const env = { options: ["dev", "prod"], active: 0, aliases: { live: 1 } };
    expect(selectVariableOption(env, "live").active).toBe(1);
    expect(selectVariableOption(env, 0).active).toBe(0);
    expect(env.active).toBe(0);
    expect(() => selectVariableOption(env, "nope")).toThrow(ConfigError);
    expect(() => selectVariableOption(env, 2)).toThrow("option index 2 is out of bounds (have 2 options)");
  });
});

describe("loadEnvFile", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "restline-env-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("parses KEY=value lines, comments and quotes", async () => {
    const file = path.join(dir, ".env");
    fs.writeFileSync(file, 'API_KEY=test-secret\n# comment\nGREETING="hello world"\n');

    expect(await loadEnvFile(file)).toEqual({ API_KEY: "test-secret", GREETING: "hello world" });
  });

  it("rejects a missing file with ConfigError", async () => {
    await expect(loadEnvFile(path.join(dir, "missing.env"))).rejects.toBeInstanceOf(ConfigError);
  });
});
