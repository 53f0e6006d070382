import { FenceState, type MarkdownSection } from "./types";

const FENCE_MARKER = "```";
const ATX_HEADER = /^#{1,6}\s/;

/**
 * Partitions markdown into sections at ATX header boundaries.
 *
 * Header detection is disabled inside fenced code, so a `# comment` line in a
 * shell snippet stays with the section that owns the fence. An unterminated
 * fence keeps detection disabled until the end of the input.
 */
export function splitIntoSections(markdown: string): MarkdownSection[] {
  if (!markdown) {
    return [];
  }

  const sections: MarkdownSection[] = [];
  let fenceState = FenceState.InProse;
  let currentHeader = "";
  let currentLines: string[] = [];

  const flush = () => {
    const content = currentLines.join("\n").trim();
    if (content) {
      sections.push({ header: currentHeader, content });
    }
  };

  for (const line of markdown.split("\n")) {
    if (line.trim().startsWith(FENCE_MARKER)) {
      fenceState = toggleFence(fenceState);
      currentLines.push(line);
      continue;
    }

    if (fenceState === FenceState.InProse && ATX_HEADER.test(line)) {
      flush();
      currentHeader = line.trim();
      currentLines = [line];
      continue;
    }

    currentLines.push(line);
  }

  flush();
  return sections;
}

function toggleFence(state: FenceState): FenceState {
  return state === FenceState.InProse ? FenceState.InFence : FenceState.InProse;
}
