import React, { useEffect, useMemo, useRef, useState } from 'react';
import { Box, Text, useApp, useInput, useStdout } from 'ink';
import { forGame } from '../events/index.js';
import { logger } from '../logger.js';
import type { GameLogEntry, Stance } from '../types.js';

type PovMode = 'ALL' | 'PUBLIC' | 'JUDGES' | { speaker: string };

export interface AppProps {
  personas: string[];
  judges: string[];
  // Entries to show up front (a replay); live games start empty and follow the logger.
  entries?: GameLogEntry[];
  live?: boolean;
  // Follow one game's entries (plus untagged session lines) when several share the logger.
  gameId?: string;
  title?: string;
}

function formatTime(iso: string): string {
  const t = iso.split('T')[1];
  if (!t) return iso;
  return t.split('.')[0] ?? t;
}

function typeColor(type: GameLogEntry['type']): string | undefined {
  switch (type) {
    case 'SYSTEM':
    case 'PROMPT':
      return 'gray';
    case 'SUSPICION':
      return 'yellow';
    case 'INTERROGATION':
      return 'cyanBright';
    case 'VOTE':
      return 'blue';
    case 'DISCUSSION':
      return 'magentaBright';
    case 'VERDICT':
      return 'magenta';
    case 'WIN':
      return 'green';
    default:
      return undefined;
  }
}

function stanceColor(stance: Stance | undefined): string {
  switch (stance) {
    case 'trait':
      return 'magenta';
    case 'divergence':
      return 'cyan';
    case 'blended':
      return 'yellow';
    default:
      return '#FFA500';
  }
}

function entryToPlainText(entry: GameLogEntry): string {
  const time = formatTime(entry.timestamp);
  const prefix = entry.player ? `[${time}] [${entry.type}] <${entry.player}>: ` : `[${time}] [${entry.type}]: `;
  return `${prefix}${entry.content}`;
}

function estimateWrappedLines(text: string, width: number): number {
  if (width <= 0) return 0;
  // Approximation by character width; only used to pick how many tail entries fit.
  let lines = 0;
  for (const part of text.split('\n')) {
    lines += Math.max(1, Math.ceil(part.length / width));
  }
  return lines;
}

function isPublic(e: GameLogEntry): boolean {
  return e.type !== 'PROMPT' && e.metadata?.visibility !== 'private';
}

function povLabel(pov: PovMode): string {
  return typeof pov === 'object' ? pov.speaker : pov;
}

export function App(props: AppProps) {
  const { exit } = useApp();
  const { stdout } = useStdout();
  const [dimensions, setDimensions] = useState(() => ({
    columns: stdout.columns ?? 80,
    rows: stdout.rows ?? 24,
  }));

  const [pov, setPov] = useState<PovMode>('PUBLIC');
  const [entries, setEntries] = useState<GameLogEntry[]>(() => {
    if (props.entries) return props.entries;
    const all = logger.getLogs();
    return props.gameId === undefined ? all : all.filter(forGame(props.gameId));
  });
  const [scrollFromBottomRows, setScrollFromBottomRows] = useState(0);
  const prevTotalRowsRef = useRef<number>(0);

  const povOrder = useMemo<PovMode[]>(() => {
    const speakers = [...props.personas, ...props.judges].map(speaker => ({ speaker }));
    return ['ALL', 'PUBLIC', 'JUDGES', ...speakers];
  }, [props.personas, props.judges]);

  useEffect(() => {
    const onResize = () => {
      setDimensions({ columns: stdout.columns ?? 80, rows: stdout.rows ?? 24 });
    };
    stdout.on('resize', onResize);
    return () => {
      stdout.off('resize', onResize);
    };
  }, [stdout]);

  useEffect(() => {
    if (!props.live) return;
    const unsub = logger.subscribe(
      e => {
        setEntries(prev => {
          const next = [...prev, e];
          return next.length > 5000 ? next.slice(-5000) : next;
        });
      },
      props.gameId === undefined ? undefined : forGame(props.gameId)
    );
    return () => {
      unsub();
    };
  }, [props.live, props.gameId]);

  const judgeSet = useMemo(() => new Set(props.judges), [props.judges]);

  const visibleEntries = useMemo(() => {
    return entries.filter(e => {
      if (pov === 'ALL') return true;
      if (pov === 'PUBLIC') return isPublic(e);
      if (pov === 'JUDGES') {
        if (!isPublic(e)) return false;
        return e.type === 'VERDICT' || e.type === 'WIN' || (e.player !== undefined && judgeSet.has(e.player));
      }
      // Single speaker: everything public plus that speaker's private entries.
      return isPublic(e) ? e.player === undefined || e.player === pov.speaker : e.player === pov.speaker;
    });
  }, [entries, judgeSet, pov]);

  // Header + key help take two rows; the log box gets the rest.
  const headerRows = 2;
  const logBoxHeight = Math.max(3, dimensions.rows - headerRows);
  const logContentRows = Math.max(1, logBoxHeight - 2);
  const logContentWidth = Math.max(10, dimensions.columns - 4);

  const metrics = useMemo(() => {
    return visibleEntries.map(e => ({
      entry: e,
      rows: estimateWrappedLines(entryToPlainText(e), logContentWidth),
    }));
  }, [visibleEntries, logContentWidth]);

  const totalRows = useMemo(() => metrics.reduce((acc, m) => acc + m.rows, 0), [metrics]);
  const maxScrollFromBottom = Math.max(0, totalRows - logContentRows);

  useEffect(() => {
    // Keep the viewport still while scrolled up and new rows arrive.
    const prev = prevTotalRowsRef.current;
    if (prev !== 0 && totalRows > prev) {
      const delta = totalRows - prev;
      setScrollFromBottomRows(v => (v > 0 ? v + delta : 0));
    }
    prevTotalRowsRef.current = totalRows;
  }, [totalRows]);

  useEffect(() => {
    setScrollFromBottomRows(v => Math.min(maxScrollFromBottom, Number.isFinite(v) ? v : maxScrollFromBottom));
  }, [maxScrollFromBottom]);

  useInput((input, key) => {
    if (input === 'q' || key.escape) {
      exit();
      return;
    }
    const page = Math.max(1, Math.floor(logContentRows * 0.9));
    if (key.upArrow) {
      setScrollFromBottomRows(v => v + 1);
      return;
    }
    if (key.downArrow) {
      setScrollFromBottomRows(v => Math.max(0, v - 1));
      return;
    }
    if (key.pageUp) {
      setScrollFromBottomRows(v => v + page);
      return;
    }
    if (key.pageDown) {
      setScrollFromBottomRows(v => Math.max(0, v - page));
      return;
    }
    if (input === 'G') {
      setScrollFromBottomRows(Number.POSITIVE_INFINITY);
      return;
    }
    if (input === 'g') {
      setScrollFromBottomRows(0);
      return;
    }
    if (input === 'p' || input === ']' || input === '[') {
      const step = input === '[' ? -1 : 1;
      setPov(current => {
        const idx = povOrder.findIndex(m => povLabel(m) === povLabel(current));
        return povOrder[(idx + step + povOrder.length) % povOrder.length] ?? 'ALL';
      });
    }
  });

  const clampedScrollFromBottom = Math.min(scrollFromBottomRows, maxScrollFromBottom);

  const lines = useMemo(() => {
    const last = metrics[metrics.length - 1];
    if (!last) return [];

    const endRowExclusive = Math.max(0, totalRows - clampedScrollFromBottom);
    const startRowInclusive = Math.max(0, endRowExclusive - logContentRows);

    const picked: GameLogEntry[] = [];
    let cursor = 0;
    for (const m of metrics) {
      const nextCursor = cursor + m.rows;
      if (nextCursor > startRowInclusive && cursor < endRowExclusive) picked.push(m.entry);
      cursor = nextCursor;
      if (cursor >= endRowExclusive) break;
    }
    return picked.length > 0 ? picked : [last.entry];
  }, [clampedScrollFromBottom, logContentRows, metrics, totalRows]);

  return (
    <Box flexDirection="column" width={dimensions.columns} height={dimensions.rows} overflow="hidden">
      <Box flexShrink={0}>
        <Text bold>{props.title ?? 'Reverse Turing'}</Text>
        <Text>  </Text>
        <Text color="gray">POV:</Text>
        <Text> {povLabel(pov)}</Text>
        <Text>  </Text>
        <Text color="gray">Entries:</Text>
        <Text> {visibleEntries.length}</Text>
      </Box>
      <Box>
        <Text color="gray">Keys:</Text>
        <Text> ↑/↓ scroll</Text>
        <Text color="gray"> | </Text>
        <Text>pgUp/pgDn</Text>
        <Text color="gray"> | </Text>
        <Text>G top / g bottom</Text>
        <Text color="gray"> | </Text>
        <Text>p/] next POV</Text>
        <Text color="gray"> | </Text>
        <Text>[ prev POV</Text>
        <Text color="gray"> | </Text>
        <Text>q/esc quit</Text>
      </Box>
      <Box borderStyle="round" flexDirection="column" paddingX={1} height={logBoxHeight} overflow="hidden" flexGrow={1}>
        {lines.map(e => (
          <Text key={e.id} wrap="wrap">
            <Text color="gray">[{formatTime(e.timestamp)}]</Text> <Text color={typeColor(e.type)}>{`[${e.type}]`}</Text>
            {e.player ? (
              <>
                <Text> </Text>
                <Text color={stanceColor(e.metadata?.stance)}>
                  {e.metadata?.stance ? `<Judge ${e.player}>` : `<${e.player}>`}
                </Text>
              </>
            ) : null}
            <Text>: </Text>
            <Text>{e.content}</Text>
          </Text>
        ))}
      </Box>
    </Box>
  );
}
