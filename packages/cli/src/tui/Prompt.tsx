import { Box, Text, useApp } from 'ink';
import TextInput from 'ink-text-input';
import { useState } from 'react';

interface PromptProps {
  question: string;
  /** Character shown instead of each typed character */
  mask?: string;
  onSubmit: (value: string) => void;
}

export function Prompt({ question, mask, onSubmit }: PromptProps): JSX.Element {
  const { exit } = useApp();
  const [value, setValue] = useState('');
  const [done, setDone] = useState(false);

  const submit = (answer: string) => {
    setDone(true);
    onSubmit(answer);
    exit();
  };

  return (
    <Box>
      <Text color="cyan">{question} </Text>
      {done ? (
        <Text color="gray">{mask ? mask.repeat(value.length) : value}</Text>
      ) : (
        <TextInput value={value} onChange={setValue} onSubmit={submit} mask={mask} />
      )}
    </Box>
  );
}
