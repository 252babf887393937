import { fromString } from "@pledge/core";
import { describeEngine } from "@pledge/testing";
import { eager, type Parser, type ParserF } from "../parser.js";
import { eagerState, type StateParser, type StateParserF } from "../state-parser.js";

describeEngine<ParserF<string>>({
  name: "eager",
  kit: eager<string>(),
  run: <A>(p: Parser<string, A>, input: string) => p.parse(input),
  tag: <A>(p: Parser<string, A>, input: string) => p.apply(fromString(input))._tag,
});

describeEngine<StateParserF<number, string>>({
  name: "stateful eager",
  kit: eagerState<number>(),
  run: <A>(p: StateParser<number, string, A>, input: string) => p.parse(input, 0),
  tag: <A>(p: StateParser<number, string, A>, input: string) =>
    p.apply({ input: fromString(input), state: 0 })._tag,
});
