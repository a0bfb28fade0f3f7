import { describe, expect, it } from "vitest";
import { Compiler } from "../../src/compiler";
import type { CompiledOutput } from "../../src/core/compile/output";
import type { CompiledNode } from "../../src/core/compile/types";
import { catalogFor } from "../../src/core/catalog/catalog";
import type { DefinitionsInput } from "../../src/core/catalog/schema";
import { span } from "../../src/core/source/span";
import { compileError, compileOk, expectDone } from "../helpers/diagnostics";

const at = (line: number, column: number) => span("test.hsc", line, column);

function root(out: CompiledOutput, name: string): CompiledNode {
  const decl = out.findScript(name) ?? out.findGlobal(name);
  if (!decl) throw new Error(`no declaration '${name}'`);
  const node = out.node(decl.root);
  if (!node) throw new Error(`no root node for '${name}'`);
  return node;
}

const argsOf = (out: CompiledOutput, name: string) => {
  const decl = out.findScript(name) ?? out.findGlobal(name);
  if (!decl) throw new Error(`no declaration '${name}'`);
  return out.argumentsOf(decl.root);
};

const messages = (out: CompiledOutput) => out.warnings.map(w => `${w.code} ${w.message}`);

describe("resolver: literals and expected types", () => {
  it("compiles a numeric literal to the declared type", () => {
    const out = compileOk("(global real my_real 2)");
    expect(out.warnings).toEqual([]);
    expect(out.nodes).toEqual([
      {
        span: at(1, 22),
        kind: "primitive",
        valueType: "real",
        data: { tag: "real", value: 2 },
        index: null,
        external: false,
        next: null,
      },
    ]);
  });

  it("reads the same token differently by position", () => {
    const out = compileOk("(global short s 1)\n(global boolean b 1)\n(global long l 1)");
    expect(root(out, "s").data).toEqual({ tag: "short", value: 1 });
    expect(root(out, "b").data).toEqual({ tag: "boolean", value: true });
    expect(root(out, "l").data).toEqual({ tag: "long", value: 1 });
  });

  it("rejects a token that does not parse as the expected type", () => {
    const diag = compileError("(script startup s (camera_control 2))");
    expect(diag.code).toBe("E0401");
    expect(diag.message).toBe("cannot parse '2' as boolean (expected true, false, on, off, 1 or 0)");

    expect(compileError("(global short s 40000)").message).toBe(
      "cannot parse '40000' as short (expected an integer from -32768 to 32767)"
    );
  });

  it("parses teams and difficulties by name", () => {
    const out = compileOk("(script startup s (ai_allegiance Player covenant))");
    expect(argsOf(out, "s").map(n => [n.valueType, n.data, n.stringData])).toEqual([
      ["team", { tag: "short", value: 1 }, "player"],
      ["team", { tag: "short", value: 3 }, "covenant"],
    ]);

    const diag = compileError("(script startup s (ai_allegiance player rebels))");
    expect(diag.message).toBe(
      "cannot parse 'rebels' as team (expected default, player, human, covenant, flood, sentinel, unused6, unused7, unused8, unused9)"
    );
  });

  it("keeps opaque names as text", () => {
    const bare = compileOk("(script startup s (ai_place Squad_A))");
    expect(argsOf(bare, "s")[0]).toMatchObject({ kind: "primitive", valueType: "ai", data: null, stringData: "squad_a" });

    const quoted = compileOk('(script startup s (ai_place "Squad_A"))');
    expect(argsOf(quoted, "s")[0].stringData).toBe("Squad_A");

    const str = compileOk('(script startup s (print "Hello There"))');
    expect(argsOf(str, "s")[0]).toMatchObject({ valueType: "string", stringData: "Hello There" });
  });

  it("refers to scripts by name where a script is expected", () => {
    const out = compileOk("(script dormant d (sleep 1))\n(script startup s (wake d))\n(script startup t (wake \"D\"))");
    const expected = { kind: "primitive", valueType: "script", data: { tag: "short", value: 0 }, index: 0, stringData: "d" };
    expect(argsOf(out, "s")[0]).toMatchObject(expected);
    expect(argsOf(out, "t")[0]).toMatchObject(expected);

    const diag = compileError("(script startup s (wake nobody))");
    expect(diag.code).toBe("E0303");
    expect(diag.message).toBe("no script 'nobody' is declared");
  });
});

describe("resolver: references", () => {
  it("resolves engine globals as external references", () => {
    const out = compileOk("(global real r game_speed)");
    expect(root(out, "r")).toMatchObject({
      kind: "global",
      valueType: "real",
      stringData: "game_speed",
      index: 5,
      external: true,
      data: null,
    });
  });

  it("resolves parameters as locals", () => {
    const out = compileOk("(script static short (twice (short n)) (* n 2))");
    expect(root(out, "twice")).toMatchObject({ kind: "function-call", valueType: "short", stringData: "*" });
    expect(argsOf(out, "twice").map(n => [n.kind, n.valueType, n.index])).toEqual([
      ["local", "short", 0],
      ["primitive", "short", null],
    ]);
  });

  it("prefers a parameter over a global of the same name", () => {
    const out = compileOk("(global real n 1)\n(script static short (f (short n)) n)");
    expect(root(out, "f")).toMatchObject({ kind: "local", valueType: "short", index: 0 });
  });

  it("calls static scripts with typed arguments", () => {
    const out = compileOk("(script static short (twice (short n)) (* n 2))\n(script startup s (sleep (twice 4)))");
    const [call] = argsOf(out, "s");
    expect(call).toMatchObject({ kind: "script-call", valueType: "short", stringData: "twice", index: 0 });
    expect(out.argumentsOf(out.nodes.indexOf(call)).map(n => n.data)).toEqual([{ tag: "short", value: 4 }]);
  });

  it("refuses to call scheduled scripts", () => {
    const diag = compileError("(script dormant d (sleep 1))\n(script startup s (d))");
    expect(diag.code).toBe("E0304");
    expect(diag.message).toBe("'d' is a dormant script and cannot be called");
    expect(diag.span).toEqual(at(2, 19));
  });

  it("names a function used as a value", () => {
    const diag = compileError("(script startup s (sleep game_won))");
    expect(diag.code).toBe("E0400");
    expect(diag.message).toBe("type mismatch: expected short, got function name (did you mean '(game_won)'?)");
    expect(compileError("(script startup s (ai_place players))").message).toBe(
      "type mismatch: expected ai, got function name (did you mean '(players)'?)"
    );

    const out = compileOk("(script startup s (inspect game_won))");
    expect(argsOf(out, "s")[0]).toMatchObject({
      valueType: "function_name",
      stringData: "game_won",
      index: catalogFor("mcc-cea").getFunction("game_won")?.index,
    });
  });

  it("reports unknown symbols and functions", () => {
    expect(compileError("(script startup s (sleep nowhere))").message).toBe("unknown symbol 'nowhere'");
    expect(compileError("(script static short five 5)\n(script startup s (sleep five))").message).toBe(
      "unknown symbol 'five' (scripts are called as '(five)')"
    );

    const fn = compileError("(script startup s (frobnicate))");
    expect(fn.code).toBe("E0301");
    expect(fn.message).toBe("unknown function 'frobnicate'");
    expect(fn.span).toEqual(at(1, 20));
  });

  it("rejects malformed calls", () => {
    expect(compileError("(script startup s ())").code).toBe("E0103");
    const head = compileError("(script startup s ((sleep 1)))");
    expect(head.code).toBe("E0102");
    expect(head.message).toBe("expected a function name, got (sleep ...)");
  });
});

describe("resolver: arity", () => {
  it("checks built-in argument counts", () => {
    expect(compileError("(script startup s (sleep))").message).toBe("'sleep' takes 1 to 2 argument(s), got 0");
    expect(compileError("(global real r (+ 1))").message).toBe("'+' takes at least 2 argument(s), got 1");
    expect(compileError("(script startup s (if true))").message).toBe("'if' takes 2 to 3 argument(s), got 1");
  });

  it("checks script argument counts", () => {
    const diag = compileError("(script static short (twice (short n)) (* n 2))\n(script startup s (sleep (twice)))");
    expect(diag.code).toBe("E0402");
    expect(diag.message).toBe("'twice' takes 1 argument(s), got 0");
  });
});

describe("resolver: passthrough inference", () => {
  it("gives arithmetic the expected type", () => {
    const out = compileOk("(global real r (+ 1 2))");
    expect(root(out, "r").valueType).toBe("real");
    expect(argsOf(out, "r").map(n => n.data)).toEqual([
      { tag: "real", value: 1 },
      { tag: "real", value: 2 },
    ]);
    expect(out.warnings).toEqual([]);
  });

  it("takes the type of the first typed argument", () => {
    const out = compileOk("(global boolean b (= (random_range 1 5) 2))");
    expect(argsOf(out, "b").map(n => [n.valueType, n.kind])).toEqual([
      ["short", "function-call"],
      ["short", "primitive"],
    ]);
  });

  it("defaults bare literals to real", () => {
    const out = compileOk("(script startup s (inspect (+ 1 2)))");
    const [sum] = argsOf(out, "s");
    expect(sum.valueType).toBe("real");
    expect(out.argumentsOf(out.nodes.indexOf(sum)).map(n => n.valueType)).toEqual(["real", "real"]);
  });

  it("parses later literals with the inferred type", () => {
    const diag = compileError("(global short s 1)\n(global boolean b (> s 2.5))");
    expect(diag.code).toBe("E0401");
    expect(diag.message).toBe("cannot parse '2.5' as short (expected an integer from -32768 to 32767)");
  });

  it("restricts arithmetic and comparisons to their types", () => {
    const sum = compileError("(script static void s (inspect (+ (players) (players))))");
    expect(sum.code).toBe("E0404");
    expect(sum.message).toBe("arguments of '+' resolve to object list, but '+' requires numbers");
    expect(sum.span).toEqual(at(1, 32));

    const cmp = compileError("(script static void s (inspect (> (players) (players))))");
    expect(cmp.message).toBe("arguments of '>' resolve to object list, but '>' requires numbers, game difficulties or teams");
  });

  it("compares game difficulties", () => {
    const out = compileOk("(global boolean b (>= (game_difficulty_get) hard))");
    expect(argsOf(out, "b").map(n => [n.valueType, n.data])).toEqual([
      ["game_difficulty", null],
      ["game_difficulty", { tag: "short", value: 2 }],
    ]);
  });

  it("has no type to give two bare names", () => {
    expect(compileError("(global boolean b (< player covenant))").message).toBe("unknown symbol 'player'");
  });
});

describe("resolver: conversions", () => {
  it("warns on widening a parameter", () => {
    const out = compileOk("(script static long (add_one (short n)) (+ n 1))");
    expect(out.findScript("add_one")?.returnType).toBe("long");
    expect(out.warnings).toHaveLength(1);
    expect(out.warnings[0]).toMatchObject({
      code: "W0001",
      severity: "warning",
      message: "implicit conversion of 'n' from short to long",
      span: at(1, 44),
    });
  });

  it("warns on narrowing a global", () => {
    const out = compileOk("(global real r 2.5)\n(global short s r)");
    expect(messages(out)).toEqual(["W0002 implicit narrowing conversion of 'r' from real to short"]);
    expect(out.warnings[0].span).toEqual(at(2, 17));
  });

  it("names function results in conversion warnings", () => {
    const out = compileOk("(global real r (random_range 1 5))");
    expect(messages(out)).toEqual(["W0001 implicit conversion of the result of 'random_range' from short to real"]);
    expect(out.warnings[0].span).toEqual(at(1, 16));
  });

  it("upcasts objects silently", () => {
    const out = compileOk("(script startup s (object_destroy (unit (list_get (players) 0))))");
    expect(out.warnings).toEqual([]);
    expect(argsOf(out, "s")[0]).toMatchObject({ stringData: "unit", valueType: "object" });
  });

  it("gives a converted reference the type of its position", () => {
    const out = compileOk("(global short s 1)\n(global long l s)");
    expect(root(out, "l")).toMatchObject({ kind: "global", stringData: "s", valueType: "long", index: 0 });
    expect(messages(out)).toEqual(["W0001 implicit conversion of 's' from short to long"]);
  });

  it("gives a converted call the type of its position", () => {
    const out = compileOk("(script static long (add_one (short n)) (+ n 1))");
    expect(root(out, "add_one")).toMatchObject({ stringData: "+", valueType: "long" });
    expect(argsOf(out, "add_one").map(n => [n.kind, n.valueType])).toEqual([
      ["local", "long"],
      ["primitive", "long"],
    ]);
  });

  it("types discarded sequence members as void", () => {
    const out = compileOk("(script startup s (begin (+ 1 2) (sleep 1)))");
    expect(argsOf(out, "s").map(n => [n.stringData, n.valueType])).toEqual([
      ["+", "void"],
      ["sleep", "void"],
    ]);
  });

  it("reports a mismatched argument with its position", () => {
    const diag = compileError("(script startup s (sleep (players)))");
    expect(diag.code).toBe("E0400");
    expect(diag.message).toBe("type mismatch: expected short, got object list in argument 1 of 'sleep'");
  });

  it("reports a mismatched body against its declaration", () => {
    const script = compileError("(script static short s (players))");
    expect(script.code).toBe("E0403");
    expect(script.message).toBe("script 's' is declared short but its body yields object list");

    const global = compileError("(global boolean b (players))");
    expect(global.message).toBe("global 'b' is declared boolean but its body yields object list");

    expect(compileError("(script static short f (begin))").message).toBe(
      "script 'f' is declared short but its body yields void"
    );
  });
});

describe("resolver: special forms", () => {
  it("types a sequence by its last member", () => {
    const out = compileOk("(global short x (begin (game_won) 3))");
    expect(root(out, "x")).toMatchObject({ stringData: "begin", valueType: "short" });
    expect(argsOf(out, "x").map(n => n.valueType)).toEqual(["void", "short"]);
  });

  it("wraps a multi-expression body in begin", () => {
    const out = compileOk("(script startup s (game_won) (game_lost))");
    expect(root(out, "s")).toMatchObject({ kind: "function-call", stringData: "begin", valueType: "void", index: 0 });
    expect(root(out, "s").span).toEqual(at(1, 19));
  });

  it("types if from its branches", () => {
    const out = compileOk("(script startup s (inspect (if true 1 2)))");
    const [cond] = argsOf(out, "s");
    expect(cond.valueType).toBe("real");
    expect(out.argumentsOf(out.nodes.indexOf(cond)).map(n => n.valueType)).toEqual(["boolean", "real", "real"]);
  });

  it("rewrites cond as nested ifs", () => {
    const out = compileOk("(global short c (cond ((game_is_cooperative) 1) (true 2)))");
    expect(out.nodes.map(n => [n.kind, n.stringData ?? null, n.valueType])).toEqual([
      ["function-call", "if", "short"],
      ["function-call", "game_is_cooperative", "boolean"],
      ["primitive", null, "short"],
      ["function-call", "if", "short"],
      ["primitive", null, "boolean"],
      ["primitive", null, "short"],
    ]);
    expect(out.nodes[0].span).toEqual(at(1, 17));
  });

  it("rejects a malformed cond clause", () => {
    const diag = compileError("(global short c (cond 1))");
    expect(diag.code).toBe("E0102");
    expect(diag.message).toBe("cond clause must be a condition followed by expressions, got 1");
  });

  it("types logical operators as boolean", () => {
    const out = compileOk("(global boolean b (and true (game_is_cooperative) off))");
    expect(argsOf(out, "b").map(n => n.valueType)).toEqual(["boolean", "boolean", "boolean"]);
    expect(argsOf(out, "b")[2].data).toEqual({ tag: "boolean", value: false });
  });

  it("assigns with the variable's type", () => {
    const out = compileOk("(script startup s (set game_speed 2))");
    expect(root(out, "s")).toMatchObject({ stringData: "set", valueType: "real" });
    expect(argsOf(out, "s").map(n => [n.kind, n.valueType, n.external])).toEqual([
      ["global", "real", true],
      ["primitive", "real", false],
    ]);

    expect(compileError("(script startup s (set nothing 1))").message).toBe(
      "'nothing' is not a global or script parameter and cannot be assigned"
    );
    expect(compileError("(global short x 1)\n(script startup s (set x (players)))").message).toBe(
      "type mismatch: expected short, got object list in argument 2 of 'set'"
    );
  });

  it("passes the expected type into every random branch", () => {
    const out = compileOk("(script startup s (begin_random (game_won) (game_lost)))");
    expect(root(out, "s").valueType).toBe("void");
    expect(argsOf(out, "s")).toHaveLength(2);
  });
});

describe("resolver: stubs and warnings", () => {
  it("gives a bodiless stub a default value", () => {
    const out = compileOk("(script stub short five)\n(script startup s (sleep (five)))");
    expect(root(out, "five")).toMatchObject({ kind: "primitive", valueType: "short", data: { tag: "short", value: 0 } });
    expect(out.warnings).toEqual([]);

    const empty = compileOk("(script stub void later)\n(script startup s (later))");
    expect(root(empty, "later")).toMatchObject({ kind: "function-call", stringData: "begin", data: null });
  });

  it("warns about stubs nothing uses", () => {
    const out = compileOk("(script stub void later)");
    expect(messages(out)).toEqual(["W0003 stub script 'later' is never replaced or called"]);
  });

  it("compiles the replacement in place of the stub", () => {
    const out = compileOk("(script stub short five 0)\n(script static short five 5)");
    expect(out.scripts).toHaveLength(1);
    expect(root(out, "five").data).toEqual({ tag: "short", value: 5 });
    expect(out.warnings).toEqual([]);
  });

  it("warns on reading a global before it is initialized", () => {
    const out = compileOk("(global short a b)\n(global short b 1)");
    expect(messages(out)).toEqual(["W0005 use of uninitialized global 'b'"]);
    expect(out.warnings[0].span).toEqual(at(1, 17));
  });

  it("warns when the program exceeds the node limit", () => {
    const definitions: DefinitionsInput = {
      engines: [
        {
          id: "xbox",
          name: "Small engine",
          limits: { maxScripts: 8, maxGlobals: 8, maxScriptParameters: 0, maxNameLength: 31, maxNodes: 3 },
        },
      ],
      functions: [
        {
          name: "begin",
          type: "passthrough",
          form: "sequence",
          parameters: [{ type: "passthrough", many: true, optional: true }],
          passthroughLast: true,
          engines: ["xbox"],
        },
        { name: "ping", type: "void", engines: ["xbox"] },
      ],
    };
    const compiler = new Compiler({ target: "xbox", definitions });
    expectDone(compiler.load("test.hsc", "(script startup s (ping) (ping) (ping))"));
    const out = expectDone(compiler.compile());
    expect(out.nodes).toHaveLength(4);
    expect(out.warnings).toEqual([
      {
        code: "W0006",
        severity: "warning",
        category: "limit",
        message: "4 nodes exceed the 3 node limit of xbox",
        data: { count: 4, max: 3, target: "xbox" },
      },
    ]);
  });
});
