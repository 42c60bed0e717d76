import { describe, expect, it } from "vitest";

import { ConfigurationError } from "../src/errors";
import {
  createPlanCacheProbe,
  drizzleProbe,
  isQueryEngineProbe,
  PlanCacheProbeConfigSchema,
} from "../src/probes";
import {
  CacheableInterpretation,
  ConcreteSelectQueryPlan,
  createSelectQuery,
  FakeQueryEngine,
  GENERATED_SELECT,
  LowLevelSelect,
  MutationQueryPlan,
  ParameterXref,
  PassThroughQuery,
  StatementTree,
} from "./fixtures/plan-cache-engine";

describe("createPlanCacheProbe", () => {
  const probe = createPlanCacheProbe();

  describe("asExecutableQuery", () => {
    it("accepts a query that builds select plans and owns bindings", () => {
      const { query } = createSelectQuery();

      expect(probe.asExecutableQuery(query)).toEqual({
        success: true,
        data: query,
      });
    });

    it("rejects a pass-through query", () => {
      const result = probe.asExecutableQuery(new PassThroughQuery("call p()"));

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.details.member).toBe("query.buildSelectQueryPlan");
      }
    });

    it("rejects a query whose plan builder is not a method", () => {
      const result = probe.asExecutableQuery({
        buildSelectQueryPlan: "plan",
        parameterBindings: {},
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.details).toEqual({
          member: "query.buildSelectQueryPlan",
          expected: "a method",
          actual: "string",
        });
      }
    });
  });

  describe("interpretationsKey", () => {
    it("asks the query engine for the key", () => {
      const { query } = createSelectQuery({ queryString: "select q from Q q" });

      expect(probe.interpretationsKey(query)).toEqual({
        success: true,
        data: "select q from Q q",
      });
    });
  });

  describe("resolveCachedPlan", () => {
    it("stores the built plan under the key", () => {
      const engine = new FakeQueryEngine();
      const { query } = createSelectQuery({
        session: { factory: { queryEngine: engine } },
      });
      const plan = new MutationQueryPlan(new StatementTree("delete"));

      const first = probe.resolveCachedPlan(query, "k", () => plan);
      const second = probe.resolveCachedPlan(query, "k", () => {
        throw new Error("should be cached");
      });

      expect(first).toEqual({ success: true, data: plan });
      expect(second).toEqual({ success: true, data: plan });
      expect(engine.interpretationCache.plans.get("k")).toBe(plan);
    });
  });

  describe("asSelectPlan", () => {
    it("accepts a concrete select plan", () => {
      const plan = new ConcreteSelectQueryPlan(
        new StatementTree("select 1"),
        new ParameterXref([]),
      );

      expect(probe.asSelectPlan(plan).success).toBe(true);
    });

    it("rejects a plan whose class has no interpretation builder", () => {
      const result = probe.asSelectPlan({ cacheableInterpretation: null });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.details).toEqual({
          member: "plan.constructor.buildCacheableInterpretation",
          expected: "a member",
          actual: "nothing",
        });
      }
    });
  });

  describe("buildInterpretation", () => {
    it("passes statement, xref and the query to the static builder", () => {
      const { query } = createSelectQuery();
      const statement = new StatementTree("select 2");
      const plan = new ConcreteSelectQueryPlan(statement, new ParameterXref([1]));

      const interpretation = probe.buildInterpretation(plan, query);

      expect(interpretation.success).toBe(true);
      if (interpretation.success) {
        expect(probe.statementSql(interpretation.data)).toEqual({
          success: true,
          data: "select 2",
        });
      }
      expect(statement.interpretationBuilds).toBe(1);
    });
  });

  describe("cachedInterpretation", () => {
    it("returns null when the plan has not built one", () => {
      const plan = new ConcreteSelectQueryPlan(
        new StatementTree("select 1"),
        new ParameterXref([]),
      );

      expect(probe.cachedInterpretation(plan)).toEqual({
        success: true,
        data: null,
      });
    });
  });

  describe("statementSql", () => {
    it("reads the SQL text through the getter", () => {
      const interpretation = new CacheableInterpretation(
        new LowLevelSelect(GENERATED_SELECT),
      );

      expect(probe.statementSql(interpretation)).toEqual({
        success: true,
        data: GENERATED_SELECT,
      });
    });
  });

  describe("visitBindings", () => {
    it("visits bound values in binding order", () => {
      const { query } = createSelectQuery({ values: ["b", "a"] });
      const visited: unknown[] = [];

      const result = probe.visitBindings(query, (value) => visited.push(value));

      expect(result.success).toBe(true);
      expect(visited).toEqual(["b", "a"]);
    });

    it("visits nothing when a binding cannot be read", () => {
      const custom = createPlanCacheProbe({ bindValueMember: "value" });
      const { query } = createSelectQuery({ values: [1, 2] });
      const visited: unknown[] = [];

      const result = custom.visitBindings(query, (value) => visited.push(value));

      expect(result.success).toBe(false);
      expect(visited).toEqual([]);
    });
  });

  describe("configuration", () => {
    it("uses configured member names", () => {
      const custom = createPlanCacheProbe({
        name: "custom",
        statementMember: "compiledStatement",
        sqlTextMember: "sql",
      });

      expect(custom.name).toBe("custom");
      expect(
        custom.statementSql({ compiledStatement: { sql: "select 3" } }),
      ).toEqual({ success: true, data: "select 3" });
    });

    it("rejects empty member names", () => {
      expect(() => createPlanCacheProbe({ sqlTextMember: "" })).toThrow(
        ConfigurationError,
      );
    });

    it("names the invalid option in the error message", () => {
      expect(() => createPlanCacheProbe({ sqlTextMember: "" })).toThrow(
        "Invalid plan-cache probe config: sqlTextMember",
      );
    });

    it("rejects unknown options", () => {
      expect(
        PlanCacheProbeConfigSchema.safeParse({ sqlText: "sql" }).success,
      ).toBe(false);
    });
  });
});

describe("isQueryEngineProbe", () => {
  it("accepts the built-in probes", () => {
    expect(isQueryEngineProbe(createPlanCacheProbe())).toBe(true);
    expect(isQueryEngineProbe(drizzleProbe)).toBe(true);
  });

  it("rejects objects missing a step", () => {
    const { visitBindings: _visitBindings, ...partial } = drizzleProbe;

    expect(isQueryEngineProbe(partial)).toBe(false);
    expect(isQueryEngineProbe({ ...drizzleProbe, name: "" })).toBe(false);
  });
});
