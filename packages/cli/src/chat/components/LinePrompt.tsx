import React, { useRef, useState } from 'react';
import { Box, Text, useInput } from 'ink';

interface LinePromptProps {
  totalTokens: number;
  /** Enter adds a newline and Ctrl+D sends, instead of Enter sending. */
  multiline?: boolean;
  onSubmit: (text: string) => void;
  /** Ctrl+D on an empty buffer. */
  onEnd: () => void;
}

export function LinePrompt({
  totalTokens,
  multiline = false,
  onSubmit,
  onEnd,
}: LinePromptProps): React.ReactElement {
  const [value, setValue] = useState('');
  // Events can arrive faster than re-renders; the ref is the source of truth.
  const buffer = useRef('');

  const update = (next: string) => {
    buffer.current = next;
    setValue(next);
  };

  useInput((input, key) => {
    if (key.ctrl && input === 'c') {
      update('');
      onSubmit('');
      return;
    }

    if (key.ctrl && input === 'd') {
      if (buffer.current.length === 0) {
        onEnd();
      } else if (multiline) {
        onSubmit(buffer.current);
      }
      return;
    }

    if (key.return) {
      if (multiline) {
        update(buffer.current + '\n');
      } else {
        onSubmit(buffer.current);
      }
      return;
    }

    if (key.backspace || key.delete) {
      update(buffer.current.slice(0, -1));
      return;
    }

    if (key.ctrl || key.meta || key.escape || key.tab || key.upArrow || key.downArrow || key.leftArrow || key.rightArrow) {
      return;
    }

    update(buffer.current + input);
  });

  return (
    <Box flexDirection="column">
      <Box>
        <Text bold>{`[${totalTokens}] >>> `}</Text>
        <Text>{value}</Text>
        <Text inverse> </Text>
      </Box>
      {multiline && <Text dimColor>(Ctrl+D to send)</Text>}
    </Box>
  );
}
