import type { Environment } from "./environment";
import { NativeFunction } from "./values";

export type Clock = () => number;

const systemClock: Clock = () => Date.now() / 1000;

/** Installs the builtin functions into the global scope. */
export function defineNatives(globals: Environment, clock: Clock = systemClock) {
    globals.define("clock", new NativeFunction("clock", 0, () => clock()));
}
