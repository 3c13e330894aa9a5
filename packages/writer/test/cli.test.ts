import { describe, expect, it } from "vitest";
import { createTestVfs, runTestCli } from "./utils/testCli.js";

const SCENE = {
  structures: [
    {
      identifier: "Metric",
      properties: { key: "distance" },
      children: [{ type: "double", data: [1 / 3] }],
    },
    {
      identifier: "GeometryNode",
      name: "node1",
      children: [
        { identifier: "Name", children: [{ type: "string", data: ['"box"'] }] },
        {
          type: "int32",
          data: [1, 2, 3, 4, 5],
        },
      ],
    },
  ],
};

const SCENE_TEXT = [
  'Metric (key = "distance")',
  "{",
  "\tdouble {0.333333}",
  "}",
  "GeometryNode $node1",
  "{",
  '\tName {string {"box"}}',
  "\tint32",
  "\t{",
  "\t\t1, 2, 3, 4, 5",
  "\t}",
  "}",
  "",
].join("\n");

describe("oddl-write", () => {
  it("should print the document to stdout without an output file", async () => {
    const vfs = createTestVfs({ "/work/scene.yaml": SCENE });

    const result = await runTestCli(["/work/scene.yaml"], vfs);

    expect(result.code).toBe(0);
    expect(result.stdout).toBe(SCENE_TEXT);
  });

  it("should write the output file", async () => {
    const vfs = createTestVfs({ "/work/scene.yaml": SCENE });

    const result = await runTestCli(
      ["/work/scene.yaml", "-o", "/work/scene.oddl"],
      vfs
    );

    expect(result.code).toBe(0);
    expect(result.stdout).toBe("");
    expect(vfs.files.get("/work/scene.oddl")).toBe(SCENE_TEXT);
    expect(result.info).toEqual(["Wrote 2 structures to /work/scene.oddl"]);
  });

  it("should pass rounding and line limits to the writer", async () => {
    const vfs = createTestVfs({ "/work/scene.yaml": SCENE });

    const result = await runTestCli(
      [
        "/work/scene.yaml",
        "--rounding",
        "none",
        "--max-elements-per-line",
        "2",
      ],
      vfs
    );

    expect(result.code).toBe(0);
    expect(result.stdout).toContain("\tdouble {0.3333333333333333}\n");
    expect(result.stdout).toContain("\t\t1, 2,\n\t\t3, 4,\n\t\t5\n");
  });

  it("should accept a rounding past the precision of a double", async () => {
    const vfs = createTestVfs({ "/work/scene.yaml": SCENE });

    const result = await runTestCli(
      ["/work/scene.yaml", "--rounding", "101"],
      vfs
    );

    expect(result.code).toBe(0);
    expect(result.stdout).toContain("\tdouble {0.3333333333333333}\n");
  });

  it("should fail with usage errors", async () => {
    const vfs = createTestVfs({});

    const noInput = await runTestCli([], vfs);
    expect(noInput.code).toBe(2);
    expect(noInput.errors[0]).toBe("Expected exactly one input file");

    const badRounding = await runTestCli(["a.yaml", "--rounding", "x"], vfs);
    expect(badRounding.code).toBe(2);
    expect(badRounding.errors[0]).toBe(
      '--rounding expects an integer >= 0, got "x"'
    );
  });

  it("should fail for a missing input file", async () => {
    const result = await runTestCli(["/work/none.yaml"], createTestVfs({}));

    expect(result.code).toBe(1);
    expect(result.errors).toEqual(["Cannot read /work/none.yaml: notFound"]);
  });

  it("should fail for an invalid description", async () => {
    const vfs = createTestVfs({
      "/work/bad.yaml": { structures: [{ name: "no identifier" }] },
    });

    const result = await runTestCli(["/work/bad.yaml"], vfs);

    expect(result.code).toBe(1);
    expect(result.errors[0]).toBe("Invalid document description /work/bad.yaml");
  });

  it("should fail for a dangling reference without writing", async () => {
    const vfs = createTestVfs({
      "/work/ref.yaml": {
        structures: [
          { identifier: "Link", children: [{ type: "ref", data: ["ghost"] }] },
        ],
      },
    });

    const result = await runTestCli(
      ["/work/ref.yaml", "-o", "/work/ref.oddl"],
      vfs
    );

    expect(result.code).toBe(1);
    expect(result.errors).toEqual(['No structure named "ghost" to reference']);
    expect(vfs.files.has("/work/ref.oddl")).toBe(false);
  });
});
