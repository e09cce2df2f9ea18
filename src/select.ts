import {
  createPrompt,
  isEnterKey,
  isSpaceKey,
  makeTheme,
  useKeypress,
  usePagination,
  usePrefix,
  useState,
} from "@inquirer/core";
import { createPalette } from "./format.js";
import { matchesName } from "./sort.js";

export interface FilterChoice {
  /** Text the typed filter is matched against. */
  name: string;
  /** Row shown in the list. */
  label: string;
}

export interface FilterSelectConfig {
  message: string;
  header?: string;
  choices: readonly FilterChoice[];
  pageSize?: number;
}

/**
 * Indexes of the choices whose name contains `term`, case-insensitively.
 */
export function matchingIndexes(
  choices: readonly FilterChoice[],
  term: string,
): number[] {
  const indexes: number[] = [];
  for (const [index, choice] of choices.entries()) {
    if (!term || matchesName(choice.name, term)) indexes.push(index);
  }
  return indexes;
}

export function toggleIndex(
  selected: ReadonlySet<number>,
  index: number,
): Set<number> {
  const next = new Set(selected);
  if (next.has(index)) {
    next.delete(index);
  } else {
    next.add(index);
  }
  return next;
}

/**
 * Multi-select with type-to-filter. Resolves with the indexes of the chosen
 * choices in list order, or null when the operator presses Esc.
 * Selections survive filter changes.
 */
export const filterSelect = createPrompt(
  (config: FilterSelectConfig, done: (value: number[] | null) => void) => {
    const { choices, pageSize = 10 } = config;
    const palette = createPalette();
    const theme = makeTheme();

    const [status, setStatus] = useState<"idle" | "done">("idle");
    const [term, setTerm] = useState("");
    const [active, setActive] = useState(0);
    const [selected, setSelected] = useState<ReadonlySet<number>>(new Set());

    const visible = matchingIndexes(choices, term);
    const prefix = usePrefix({ status, theme });

    useKeypress((key, rl) => {
      if (isEnterKey(key)) {
        setStatus("done");
        done([...selected].sort((a, b) => a - b));
      } else if (key.name === "escape") {
        setStatus("done");
        done(null);
      } else if (key.name === "up" || key.name === "down") {
        const step = key.name === "up" ? -1 : 1;
        setActive(Math.min(Math.max(0, active + step), Math.max(0, visible.length - 1)));
        rl.clearLine(0);
        rl.write(term);
      } else if (isSpaceKey(key)) {
        const index = visible[active];
        if (index !== undefined) {
          setSelected(toggleIndex(selected, index));
        }
        // space selects rather than filters
        rl.clearLine(0);
        rl.write(term);
      } else if (rl.line !== term) {
        setTerm(rl.line);
        setActive(0);
      }
    });

    const page = usePagination({
      items: visible,
      active,
      pageSize,
      loop: false,
      renderItem: ({ item, isActive }) => {
        const choice = choices[item];
        const pointer = isActive ? palette.cyan("❯") : " ";
        const box = selected.has(item) ? palette.green("◉") : "◯";
        return `${pointer}${box} ${choice?.label ?? ""}`;
      },
    });

    const message = palette.bold(config.message);

    if (status === "done") {
      return `${prefix} ${message} ${palette.cyan(`${selected.size} selected`)}`;
    }

    const body =
      visible.length === 0 ? palette.dim("  No matching processes") : page;

    const help = palette.dim(
      `${selected.size} selected • ↑↓ navigate • Space select • Enter confirm • Esc cancel • type to filter`,
    );

    const lines = config.header
      ? [`   ${config.header}`, body, help]
      : [body, help];

    return [`${prefix} ${message} ${term}`, lines.join("\n")];
  },
);
