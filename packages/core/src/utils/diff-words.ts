import { diffArrays } from "diff";

interface TextItem {
  text: string;
}

interface DiffWordRemoved<T extends TextItem> {
  type: "removed";
  word: T;
}

interface DiffWordAdded {
  type: "added";
  text: string;
}

interface DiffWordUnchanged<T extends TextItem> {
  type: "unchanged";
  word: T;
}

interface DiffWordModified<T extends TextItem> {
  type: "modified";
  word: T;
  text: string;
}

export type DiffWord<T extends TextItem = TextItem> =
  | DiffWordRemoved<T>
  | DiffWordAdded
  | DiffWordUnchanged<T>
  | DiffWordModified<T>;

/**
 * Diffs timed words against the tokens of a text.
 *
 * A removal immediately followed by an addition is paired up as
 * modifications, one word per token; the surplus on either side stays a
 * removal or an addition.
 * @param areWordsSame comparison used both for the diff and for reporting; defaults to strict equality
 */
export function diffWords<T extends TextItem>(
  oldWords: T[],
  newWordTexts: string[],
  areWordsSame: (left: string, right: string) => boolean = (left, right) =>
    left === right
): DiffWord<T>[] {
  const oldWordTexts = oldWords.map((w) => w.text);
  const changes = diffArrays(oldWordTexts, newWordTexts, {
    comparator: areWordsSame,
  });

  const result: DiffWord<T>[] = [];
  let oldIndex = 0;
  let newIndex = 0;
  let i = 0;

  while (i < changes.length) {
    const change = changes[i];
    const count = change.value.length;

    if (change.removed) {
      const next = i + 1 < changes.length ? changes[i + 1] : null;

      if (next && next.added) {
        const addedCount = next.value.length;
        const modificationCount = Math.min(count, addedCount);

        for (let j = 0; j < modificationCount; j++) {
          result.push({
            type: "modified",
            word: oldWords[oldIndex + j],
            text: newWordTexts[newIndex + j],
          });
        }
        for (let j = modificationCount; j < count; j++) {
          result.push({ type: "removed", word: oldWords[oldIndex + j] });
        }
        for (let j = modificationCount; j < addedCount; j++) {
          result.push({ type: "added", text: newWordTexts[newIndex + j] });
        }

        oldIndex += count;
        newIndex += addedCount;
        i += 2;
        continue;
      }

      for (let j = 0; j < count; j++) {
        result.push({ type: "removed", word: oldWords[oldIndex + j] });
      }
      oldIndex += count;
    } else if (change.added) {
      for (let j = 0; j < count; j++) {
        result.push({ type: "added", text: newWordTexts[newIndex + j] });
      }
      newIndex += count;
    } else {
      // Common run: the comparator may be looser than equality
      for (let j = 0; j < count; j++) {
        const oldWord = oldWords[oldIndex + j];
        const newText = newWordTexts[newIndex + j];
        result.push(
          oldWord.text === newText
            ? { type: "unchanged", word: oldWord }
            : { type: "modified", word: oldWord, text: newText }
        );
      }
      oldIndex += count;
      newIndex += count;
    }
    i++;
  }

  return result;
}
