// Human-view structural markers
export const CELL_START_PREFIX = "# <<cell:";
export const CELL_START_SUFFIX = ">>";
export const CELL_END_MARKER = "# <</cell>>";

export const CELL_START_PATTERN = /^# <<cell:(code|markdown|raw)>>$/;

// Lines a cell spends on structure around its content (header + footer)
export const CELL_HEADER_LINES = 1;
export const CELL_FOOTER_LINES = 1;

export const DEFAULT_LANGUAGE = "python";

// Human-view Y.Doc keys
export const HUMAN_TEXT_KEY = "human"; // Y.Text
