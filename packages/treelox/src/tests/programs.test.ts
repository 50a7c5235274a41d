import { describe, it, expect } from "vitest";
import * as fs from "fs";
import * as path from "path";
import { Session } from "../session";

// Each program states its output in `// expect: <line>` comments, in order.
const programsDir = path.join(__dirname, "../../tests/programs");

function expectedOutput(source: string): string[] {
    return [...source.matchAll(/\/\/ expect: (.*)$/gm)].map((m) => m[1]);
}

describe("example programs", () => {
    const files = fs.readdirSync(programsDir).filter((f) => f.endsWith(".lox")).sort();

    it("should find the example programs", () => {
        expect(files.length).toBeGreaterThan(0);
    });

    files.forEach((file) => {
        it(`should run ${file}`, () => {
            const source = fs.readFileSync(path.join(programsDir, file), "utf-8");
            const output: string[] = [];
            const session = new Session({ write: (text) => output.push(text) });

            expect(session.run(source)).toEqual({ status: "ok" });
            expect(output).toEqual(expectedOutput(source));
        });
    });
});
