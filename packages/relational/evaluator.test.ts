import { MemoryConfigurationManager } from "@ralg/core/configuration.js"
import { LogLevel, MemoryLogWriter } from "@ralg/core/logging.js"
import {
  OperatorArity,
  RelationalNodeType,
  describeNode,
  type OperatorNode,
} from "./ast.js"
import { and, eq, from, gt, gte, lt, ne, not, or } from "./builder.js"
import { RelationalErrorCode } from "./errors.js"
import {
  DERIVED_RELATION_NAME,
  Evaluator,
  evaluate,
  evaluatorOptionsFrom,
} from "./evaluator.js"
import { attribute } from "./schema.js"
import {
  createTestRelation,
  createUsers,
  errorCodes,
  raw,
  unwrap,
} from "./testUtils.js"
import { ValueType, integer, string, tupleOf, type Tuple } from "./values.js"

describe("Projection should produce new derived relations", () => {
  it("Should select all attributes with a star", () => {
    const relation = createTestRelation([1, "foo"], [2, "bar"], [3, "baz"])

    const derived = unwrap(from(relation).project("*").evaluate())

    expect(derived.name).toBe(DERIVED_RELATION_NAME)
    expect(derived.schema.equals(relation.schema)).toBeTruthy()
    expect(raw(derived.tuples())).toEqual([
      [1n, "foo"],
      [2n, "bar"],
      [3n, "baz"],
    ])
  })

  it("Should equal the input when projecting every attribute in order", () => {
    const relation = createTestRelation([2, "bar"], [1, "foo"])

    const derived = unwrap(from(relation).project("key", "value").evaluate())

    expect(derived.tuples()).toEqual(relation.tuples())
    expect(derived.isKeyed).toBeFalsy()
  })

  it("Should eliminate duplicate projected rows", () => {
    const relation = createTestRelation(
      [1, "foo"],
      [2, "bar"],
      [3, "baz"],
      [4, "foo"],
    )

    const derived = unwrap(from(relation).project("value").evaluate())

    expect(derived.schema.toString()).toBe("(value: string)")
    expect(raw(derived.tuples())).toEqual([["foo"], ["bar"], ["baz"]])
    expect(derived.size).toBe(3)
  })

  it("Should key derived rows densely in output order", () => {
    const relation = createTestRelation([1, "foo"], [2, "bar"], [4, "foo"])

    const derived = unwrap(from(relation).project("value").evaluate())

    expect(derived.lookup(integer(0))).toEqual([string("foo")])
    expect(derived.lookup(integer(1))).toEqual([string("bar")])
    expect(derived.lookup(integer(2))).toBeUndefined()
  })

  it("Should reorder attributes as listed", () => {
    const relation = createTestRelation([1, "foo"])

    const derived = unwrap(from(relation).project("value", "key").evaluate())

    expect(derived.schema.toString()).toBe("(value: string, key: integer)")
    expect(raw(derived.tuples())).toEqual([["foo", 1n]])
  })

  it("Should accept typed attribute selectors", () => {
    const relation = createTestRelation([1, "foo"])

    const derived = unwrap(
      from(relation)
        .project(attribute("value", ValueType.STRING))
        .evaluate(),
    )
    expect(raw(derived.tuples())).toEqual([["foo"]])

    expect(
      errorCodes(
        from(relation)
          .project(attribute("value", ValueType.INTEGER))
          .evaluate(),
      ),
    ).toEqual([RelationalErrorCode.UNKNOWN_ATTRIBUTE])
  })

  it("Should fail on unknown attributes without producing a relation", () => {
    const relation = createTestRelation([1, "foo"])

    const result = from(relation).project("value", "missing").evaluate()

    expect(result.success).toBeFalsy()
    if (!result.success) {
      expect(result.errors).toHaveLength(1)
      expect(result.errors[0].code).toBe(RelationalErrorCode.UNKNOWN_ATTRIBUTE)
      expect(result.errors[0].attribute).toBe("missing")
      expect(result.errors[0].message).toBe("test has no attribute missing")
    }
  })

  it("Should fail when an attribute is selected twice", () => {
    const relation = createTestRelation([1, "foo"])

    expect(
      errorCodes(from(relation).project("value", "value").evaluate()),
    ).toEqual([RelationalErrorCode.DUPLICATE_ATTRIBUTE_NAME])
  })

  it("Should produce an empty relation from an empty input", () => {
    const relation = createTestRelation()

    const derived = unwrap(from(relation).project("value").evaluate())

    expect(derived.size).toBe(0)
    expect(derived.schema.toString()).toBe("(value: string)")
  })

  it("Should not modify or alias the input", () => {
    const relation = createTestRelation([1, "foo"], [2, "foo"])
    const before = relation.tuples()

    const derived = unwrap(from(relation).project("key", "value").evaluate())

    expect(relation.tuples()).toEqual(before)
    expect(derived.tuples()[0]).not.toBe(before[0])
    expect(derived.tuples()[0][0]).not.toBe(before[0][0])
  })

  it("Should copy a bare relation when it is the whole tree", () => {
    const relation = createTestRelation([1, "foo"])

    const copy = unwrap(from(relation).evaluate())

    expect(copy).not.toBe(relation)
    expect(copy.primaryKey).toBe(0)
    expect(copy.tuples()).toEqual(relation.tuples())
  })
})

describe("Operators should compose over derived relations", () => {
  it("Should project a projection of users", () => {
    const users = createUsers()

    const contacts = unwrap(from(users).project("name", "phone").evaluate())
    expect(raw(contacts.tuples())).toEqual([
      ["bob", 9999999999n],
      ["alice", 6666666666n],
    ])

    const phones = unwrap(from(contacts).project("phone").evaluate())
    expect(raw(phones.tuples())).toEqual([[9999999999n], [6666666666n]])
  })

  it("Should evaluate nested trees bottom up", () => {
    const users = createUsers()

    const nested = unwrap(
      from(users).project("name", "phone").project("phone").evaluate(),
    )

    expect(raw(nested.tuples())).toEqual([[9999999999n], [6666666666n]])
    expect(users.size).toBe(2)
  })

  it("Should match a single projection of the common attributes", () => {
    const relation = createTestRelation(
      [1, "foo"],
      [2, "bar"],
      [3, "foo"],
    )

    const composed = unwrap(
      from(relation).project("value", "key").project("value").evaluate(),
    )
    const direct = unwrap(from(relation).project("value").evaluate())

    expect(composed.tuples()).toEqual(direct.tuples())
    expect(composed.schema.equals(direct.schema)).toBeTruthy()
  })

  it("Should match a single projection when the outer one reorders", () => {
    const users = createUsers()

    const composed = unwrap(
      from(users)
        .project("name", "phone", "id")
        .project("phone", "name")
        .evaluate(),
    )
    const direct = unwrap(from(users).project("phone", "name").evaluate())

    expect(composed.schema.toString()).toBe("(phone: integer, name: string)")
    expect(composed.schema.equals(direct.schema)).toBeTruthy()
    expect(raw(composed.tuples())).toEqual([
      [9999999999n, "bob"],
      [6666666666n, "alice"],
    ])
    expect(composed.tuples()).toEqual(direct.tuples())
  })

  it("Should compose projections over a generated relation", () => {
    const relation = createTestRelation()
    const rows: Tuple[] = []
    // 37 is coprime with 301 so every key in 0..300 appears once
    for (let n = 0; n < 301; ++n) {
      const key = (n * 37) % 301
      rows.push(tupleOf(key, `v${key % 7}`))
    }
    unwrap(relation.insertRows(rows))

    const composed = unwrap(
      from(relation).project("value", "key").project("value").evaluate(),
    )
    const direct = unwrap(from(relation).project("value").evaluate())

    expect(composed.tuples()).toEqual(direct.tuples())
    expect(raw(direct.tuples())).toEqual([
      ["v0"],
      ["v1"],
      ["v2"],
      ["v3"],
      ["v4"],
      ["v5"],
      ["v6"],
    ])
  })

  it("Should report failures from inner nodes", () => {
    const users = createUsers()

    expect(
      errorCodes(from(users).project("missing").project("phone").evaluate()),
    ).toEqual([RelationalErrorCode.UNKNOWN_ATTRIBUTE])
  })
})

describe("Selection should filter rows", () => {
  const relation = createTestRelation(
    [1, "foo"],
    [2, "bar"],
    [3, "baz"],
    [4, "foo"],
  )

  it("Should apply column comparisons", () => {
    const matching = unwrap(from(relation).where(eq("value", "foo")).evaluate())
    expect(raw(matching.tuples())).toEqual([
      [1n, "foo"],
      [4n, "foo"],
    ])

    const greater = unwrap(from(relation).where(gt("key", 2)).evaluate())
    expect(raw(greater.tuples())).toEqual([
      [3n, "baz"],
      [4n, "foo"],
    ])

    const other = unwrap(from(relation).where(ne("value", "foo")).evaluate())
    expect(raw(other.tuples())).toEqual([
      [2n, "bar"],
      [3n, "baz"],
    ])
  })

  it("Should combine filters with boolean groups", () => {
    const both = unwrap(
      from(relation)
        .where(and(gte("key", 2), lt("key", 4)))
        .evaluate(),
    )
    expect(raw(both.tuples())).toEqual([
      [2n, "bar"],
      [3n, "baz"],
    ])

    const either = unwrap(
      from(relation)
        .where(or(eq("key", 1), eq("value", "baz")))
        .evaluate(),
    )
    expect(raw(either.tuples())).toEqual([
      [1n, "foo"],
      [3n, "baz"],
    ])

    const neither = unwrap(
      from(relation)
        .where(not(eq("value", "foo"), eq("key", 2)))
        .evaluate(),
    )
    expect(raw(neither.tuples())).toEqual([[3n, "baz"]])
  })

  it("Should keep the input key", () => {
    const selected = unwrap(from(relation).where(eq("value", "foo")).evaluate())

    expect(selected.primaryKey).toBe(0)
    expect(selected.lookup(integer(4))).toEqual(relation.lookup(integer(4)))
  })

  it("Should validate filter columns and types", () => {
    expect(
      errorCodes(from(relation).where(eq("missing", 1)).evaluate()),
    ).toEqual([RelationalErrorCode.UNKNOWN_ATTRIBUTE])
    expect(
      errorCodes(
        from(relation)
          .where(and(eq("key", "1"), eq("value", 2)))
          .evaluate(),
      ),
    ).toEqual([
      RelationalErrorCode.TYPE_MISMATCH,
      RelationalErrorCode.TYPE_MISMATCH,
    ])
  })

  it("Should project a selection", () => {
    const names = unwrap(
      from(relation).where(lt("key", 3)).project("value").evaluate(),
    )

    expect(raw(names.tuples())).toEqual([["foo"], ["bar"]])
  })
})

describe("Binary operators should read both inputs", () => {
  it("Should union compatible relations without duplicates", () => {
    const left = createTestRelation([1, "foo"], [2, "bar"])
    const right = createTestRelation([2, "bar"], [3, "baz"])

    const union = unwrap(from(left).union(right).evaluate())

    expect(union.isKeyed).toBeFalsy()
    expect(raw(union.tuples())).toEqual([
      [1n, "foo"],
      [2n, "bar"],
      [3n, "baz"],
    ])
  })

  it("Should union derived relations", () => {
    const left = createTestRelation([1, "foo"], [2, "bar"])
    const right = createTestRelation([7, "foo"], [8, "qux"])

    const values = unwrap(
      from(left).project("value").union(from(right).project("value")).evaluate(),
    )

    expect(raw(values.tuples())).toEqual([["foo"], ["bar"], ["qux"]])
  })

  it("Should reject incompatible schemas", () => {
    const users = createUsers()
    const relation = createTestRelation([1, "foo"])

    expect(errorCodes(from(users).union(relation).evaluate())).toEqual([
      RelationalErrorCode.INCOMPATIBLE_SCHEMA,
    ])
  })

  it("Should report joins as unsupported", () => {
    const users = createUsers()
    const relation = createTestRelation([100, "admin"])

    expect(
      errorCodes(
        from(users)
          .join(relation, [{ left: "id", right: "key" }])
          .evaluate(),
      ),
    ).toEqual([RelationalErrorCode.UNSUPPORTED_OPERATOR])
  })
})

describe("The evaluator should be configurable", () => {
  it("Should evaluate hand built trees", () => {
    const users = createUsers()
    const node: OperatorNode = {
      nodeType: RelationalNodeType.PROJECTION,
      arity: OperatorArity.UNARY,
      columns: ["name"],
      source: { nodeType: RelationalNodeType.RELATION, relation: users },
    }

    expect(describeNode(node)).toBe("π[name](users)")
    expect(raw(unwrap(evaluate(node)).tuples())).toEqual([["bob"], ["alice"]])
  })

  it("Should name derived relations and log through the writer", () => {
    const writer = new MemoryLogWriter()
    const evaluator = new Evaluator({
      derivedName: "result",
      logWriter: writer,
      logLevel: LogLevel.DEBUG,
    })
    const users = createUsers()

    const result = unwrap(
      evaluator.evaluate(from(users).project("name").asNode()),
    )
    expect(result.name).toBe("result")

    const failed = evaluator.evaluate(from(users).project("age").asNode())
    expect(failed.success).toBeFalsy()

    expect(writer.messages(LogLevel.WARN)).toEqual([
      "π[age](users) failed: users has no attribute age",
    ])
    expect(
      writer
        .messages(LogLevel.DEBUG)
        .filter((m) => m.startsWith("Projection")),
    ).toEqual(["Projection kept 2 of 2 tuple(s) from users"])
  })

  it("Should read options from configuration", () => {
    const config = new MemoryConfigurationManager()
    expect(evaluatorOptionsFrom(config)).toEqual({})

    config.set("evaluator", { derivedName: "view", logLevel: "debug" })
    expect(evaluatorOptionsFrom(config)).toEqual({
      derivedName: "view",
      logLevel: LogLevel.DEBUG,
    })

    const users = createUsers()
    const derived = unwrap(
      from(users).project("id").evaluate(evaluatorOptionsFrom(config)),
    )
    expect(derived.name).toBe("view")
  })
})
