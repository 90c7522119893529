import React, { useMemo, useRef, useState } from "react";
import path from "node:path";
import { Box, Newline, render, Text, useApp, useInput } from "ink";
import TextInput from "ink-text-input";
import type { InteractionPort, SelectionOption } from "./commands/types.js";
import type { EventLog } from "./event-log.js";
import { getProviderLabel } from "./models.js";
import { ReplController } from "./repl/controller.js";
import type { SendOutput } from "./repl/send-pipeline.js";
import type { SessionManager } from "./session/session-manager.js";

type UiEntry = {
  id: number;
  kind: "user" | "output" | "system";
  text: string;
};

type SelectorState = {
  title: string;
  options: SelectionOption[];
  index: number;
  allowCancel: boolean;
  resolve: (value: string | null) => void;
};

type TextPromptState = {
  prompt: string;
  resolve: (value: string) => void;
};

export type TuiOptions = {
  manager: SessionManager;
  log: EventLog;
  notices?: string[];
};

const GLYPH_USER = "> ";
const GLYPH_SYSTEM = "⌁ ";
const SELECTOR_WINDOW = 8;
const MAX_VISIBLE_ENTRIES = 200;

function App({ manager, log, notices = [] }: TuiOptions) {
  const { exit } = useApp();
  const nextIdRef = useRef(0);
  const liveTextRef = useRef("");
  const [entries, setEntries] = useState<UiEntry[]>(() =>
    notices.map((text) => ({ id: nextIdRef.current++, kind: "system", text })),
  );
  const [liveText, setLiveText] = useState("");
  const [input, setInput] = useState("");
  const [inputResetKey, setInputResetKey] = useState(0);
  const [busy, setBusy] = useState(false);
  const [selector, setSelector] = useState<SelectorState | null>(null);
  const [textPrompt, setTextPrompt] = useState<TextPromptState | null>(null);
  const [composeBuffer, setComposeBuffer] = useState<string[]>([]);
  const [, setRevision] = useState(0);

  const appendEntry = (kind: UiEntry["kind"], text: string) => {
    const id = nextIdRef.current++;
    setEntries((current) => [...current, { id, kind, text }].slice(-MAX_VISIBLE_ENTRIES));
  };

  const controller = useMemo(() => {
    const output: SendOutput = {
      write(text) {
        liveTextRef.current += text;
        setLiveText(liveTextRef.current);
      },
      line(text) {
        const combined = liveTextRef.current + text;
        liveTextRef.current = "";
        setLiveText("");
        appendEntry("output", combined);
      },
    };

    const interaction: InteractionPort = {
      promptText(prompt) {
        return new Promise<string>((resolve) => {
          setTextPrompt({ prompt, resolve });
        });
      },
      notify(message) {
        appendEntry("system", message);
      },
      promptSelection(options, config = {}) {
        if (options.length === 0) {
          return Promise.resolve(null);
        }
        return new Promise<string | null>((resolve) => {
          setSelector({
            title: config.title ?? "Select an option:",
            options,
            index: 0,
            allowCancel: config.allowCancel ?? true,
            resolve,
          });
        });
      },
    };

    return new ReplController({ manager, log, interaction, output });
  }, [manager, log]);

  const closeSelector = (value: string | null) => {
    if (!selector) {
      return;
    }
    setSelector(null);
    selector.resolve(value);
  };

  useInput((character, key) => {
    if (key.ctrl && character === "c") {
      controller.shutdown();
      exit();
      return;
    }

    if (selector) {
      if (key.escape) {
        if (selector.allowCancel) {
          closeSelector(null);
        }
        return;
      }
      if (key.upArrow || key.downArrow) {
        const direction = key.downArrow ? 1 : -1;
        setSelector((current) => {
          if (!current) {
            return current;
          }
          const optionCount = current.options.length;
          return { ...current, index: (current.index + direction + optionCount) % optionCount };
        });
        return;
      }
      if (key.return) {
        closeSelector(selector.options[selector.index]?.value ?? null);
      }
      return;
    }

    if (key.escape) {
      if (controller.cancelActiveRequest()) {
        return;
      }
      if (composeBuffer.length > 0) {
        setComposeBuffer([]);
        appendEntry("system", "compose buffer cleared.");
      }
    }
  });

  const runLine = async (line: string) => {
    appendEntry("user", line);
    setBusy(true);
    try {
      const outcome = await controller.processLine(line);
      if (outcome === "exit") {
        exit();
      }
    } finally {
      setBusy(false);
      setRevision((current) => current + 1);
    }
  };

  const resetInput = () => {
    setInput("");
    setInputResetKey((current) => current + 1);
  };

  const handleSubmit = (submitted: string) => {
    if (selector) {
      return;
    }
    resetInput();

    if (textPrompt) {
      setTextPrompt(null);
      appendEntry("user", `${textPrompt.prompt}${submitted}`);
      textPrompt.resolve(submitted);
      return;
    }
    if (busy) {
      return;
    }

    if (manager.inputMode === "compose") {
      if (composeBuffer.length === 0 && submitted.trim().startsWith("/")) {
        void runLine(submitted.trim());
        return;
      }
      if (!submitted.trim()) {
        if (composeBuffer.length === 0) {
          return;
        }
        const message = composeBuffer.join("\n");
        setComposeBuffer([]);
        void runLine(message);
        return;
      }
      setComposeBuffer((current) => [...current, submitted]);
      return;
    }

    if (!submitted.trim()) {
      return;
    }
    void runLine(submitted.trim());
  };

  const banners = controller.modeBanners();
  const chatLabel = manager.chatPath ? path.basename(manager.chatPath) : "none";
  const statusLine = [
    `${getProviderLabel(manager.currentProvider)} (${manager.currentModel})`,
    `chat: ${chatLabel}`,
    `input: ${manager.inputMode}`,
    manager.searchMode ? "search: on" : null,
    `timeout: ${manager.timeout > 0 ? `${manager.timeout}s` : "off"}`,
  ]
    .filter(Boolean)
    .join(" | ");

  const windowStart = selector
    ? Math.min(
      Math.max(0, selector.index - Math.floor(SELECTOR_WINDOW / 2)),
      Math.max(0, selector.options.length - SELECTOR_WINDOW),
    )
    : 0;
  const windowedOptions = selector ? selector.options.slice(windowStart, windowStart + SELECTOR_WINDOW) : [];

  const promptGlyph = selector
    ? "select> "
    : textPrompt
      ? textPrompt.prompt
      : composeBuffer.length > 0
        ? "... "
        : GLYPH_USER;

  return (
    <Box flexDirection="column" paddingX={1}>
      <Text color="cyanBright">chorus</Text>
      <Text color="gray">{statusLine}</Text>
      <Newline />
      <Box flexDirection="column">
        {entries.map((entry) => (
          <MemoizedEntryRow key={entry.id} entry={entry} />
        ))}
        {liveText && <Text color="white">{liveText}</Text>}
      </Box>
      {selector && (
        <Box flexDirection="column" marginTop={1}>
          <Text color="cyanBright">{selector.title}</Text>
          {windowedOptions.map((option, windowIndex) => {
            const absoluteIndex = windowStart + windowIndex;
            const selected = absoluteIndex === selector.index;
            return (
              <Text key={`option-${absoluteIndex}-${option.value}`} color={selected ? "magentaBright" : "gray"}>
                {selected ? ">" : " "} {option.label}
              </Text>
            );
          })}
          {selector.options.length > windowedOptions.length && (
            <Text color="gray">
              showing {windowStart + 1}-{windowStart + windowedOptions.length} of {selector.options.length}
            </Text>
          )}
          <Text color="gray">{selector.allowCancel ? "use up/down + enter. esc cancels." : "use up/down + enter."}</Text>
        </Box>
      )}
      {banners.map((banner) => (
        <Text key={banner} color="yellow">
          {banner}
        </Text>
      ))}
      {busy && !textPrompt && !selector && <Text color="yellow">{GLYPH_SYSTEM}waiting... (esc cancels)</Text>}
      {composeBuffer.length > 0 && (
        <Text color="gray">
          compose: {composeBuffer.length} line(s) buffered | empty line sends | esc clears
        </Text>
      )}
      <Box marginTop={1}>
        <Text color="magentaBright">{promptGlyph}</Text>
        <TextInput
          key={`prompt-input-${inputResetKey}`}
          value={input}
          focus={!selector}
          onChange={setInput}
          onSubmit={handleSubmit}
        />
      </Box>
    </Box>
  );
}

function EntryRow({ entry }: { entry: UiEntry }) {
  if (entry.kind === "user") {
    return <Text color="blueBright">{GLYPH_USER}{entry.text}</Text>;
  }
  if (entry.kind === "system") {
    return <MarkdownText text={entry.text} prefix={GLYPH_SYSTEM} color="gray" />;
  }
  return <MarkdownText text={entry.text} />;
}

const MemoizedEntryRow = React.memo(EntryRow);

function MarkdownText({ text, prefix = "", color = "white" }: { text: string; prefix?: string; color?: string }) {
  const lines = text.replace(/\r\n/g, "\n").split("\n");
  let usedPrefix = false;
  let inCodeBlock = false;

  return (
    <Box flexDirection="column">
      {lines.map((line, index) => {
        const trimmed = line.trim();
        const linePrefix = trimmed.length > 0 ? (!usedPrefix ? prefix : " ".repeat(prefix.length)) : "";
        if (trimmed.length > 0) {
          usedPrefix = true;
        }

        if (/^```/.test(trimmed)) {
          inCodeBlock = !inCodeBlock;
          return null;
        }

        if (inCodeBlock) {
          return (
            <Text key={`line-${index}`} color="yellow">
              {linePrefix}
              {line}
            </Text>
          );
        }

        if (!trimmed) {
          return <Text key={`line-${index}`}> </Text>;
        }

        const headingMatch = line.match(/^(#{1,6})\s+(.+)$/);
        if (headingMatch) {
          return (
            <Text key={`line-${index}`} color="cyanBright" bold>
              {linePrefix}
              {renderInlineMarkdown(headingMatch[2] ?? "", `h-${index}`)}
            </Text>
          );
        }

        const bulletMatch = line.match(/^(\s*)[-*]\s+(.+)$/);
        if (bulletMatch) {
          return (
            <Text key={`line-${index}`} color={color}>
              {linePrefix}
              {" ".repeat(bulletMatch[1]?.length ?? 0)}* {renderInlineMarkdown(bulletMatch[2] ?? "", `b-${index}`)}
            </Text>
          );
        }

        return (
          <Text key={`line-${index}`} color={color}>
            {linePrefix}
            {renderInlineMarkdown(line, `p-${index}`)}
          </Text>
        );
      })}
    </Box>
  );
}

function renderInlineMarkdown(input: string, keyPrefix: string): React.ReactNode[] {
  const text = input.replace(/\[([^\]]+)\]\(([^)]+)\)/g, "$1 ($2)");
  const tokens = text.split(/(\*\*[^*]+\*\*|`[^`]+`)/g);

  const nodes: React.ReactNode[] = [];
  let index = 0;
  for (const token of tokens) {
    if (!token) {
      continue;
    }
    if (token.startsWith("**") && token.endsWith("**")) {
      nodes.push(
        <Text key={`${keyPrefix}-${index++}`} bold>
          {token.slice(2, -2)}
        </Text>,
      );
      continue;
    }
    if (token.startsWith("`") && token.endsWith("`")) {
      nodes.push(
        <Text key={`${keyPrefix}-${index++}`} color="yellow">
          {token.slice(1, -1)}
        </Text>,
      );
      continue;
    }
    nodes.push(<Text key={`${keyPrefix}-${index++}`}>{token}</Text>);
  }
  return nodes;
}

export async function startTuiApp(options: TuiOptions): Promise<void> {
  const instance = render(<App {...options} />, { exitOnCtrlC: false });
  await instance.waitUntilExit();
}
