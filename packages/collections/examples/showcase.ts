/**
 * @setkit/collections Showcase
 *
 * Replays a short session against a mixed scalar set, passing every line
 * of output to `print`.
 */

import { scalarSet } from "../src/index.js";

export function runShowcase(print: (line: string) => void = console.log): void {
  const set = scalarSet();
  set.add(1);
  set.unionUpdate(2, 3, 4, 5, 1);
  print(set.describe());
  print(String(set.length()));

  set.intersectionUpdate(4, 5, 2, 1);
  print(set.describe());

  set.differenceUpdate(4, 5, 6, 7);
  print(set.describe());
  print(String(set.contains(2)));
  print(String(set.length()));
}
