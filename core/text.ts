const NONE = "(none)";

const formatLines = (lines: string[]) => {
  if (lines.length === 0) {
    return NONE;
  }
  return lines.map((line) => `- ${line}`).join("\n");
};

const orNone = (value: string) => (value.length === 0 ? NONE : value);

const truncate = (input: string, max: number) => {
  if (input.length <= max) {
    return input;
  }
  return `${input.slice(0, max)}...`;
};

export { formatLines, orNone, truncate };
