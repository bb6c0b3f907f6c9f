// Stand-in for 'inquirer' in tests. Unscripted prompts pick "quit",
// so a HistoryBrowser loop always ends.
class Separator {
  readonly type = 'separator';

  constructor(public line = '──────') {}
}

const inquirer = {
  prompt: jest.fn().mockResolvedValue({ choice: 'quit' }),
  Separator,
};

export default inquirer;
