// eslint-disable-next-line @typescript-eslint/naming-convention -- React is a third-party naming standard
import * as React from 'react';

export interface QuestionBoxProps {
  question: string;
  answer: string;
  /** Keeps the year selection when the question is submitted */
  selectedYears: number[];
}

const styles = {
  input: {
    width: '60%',
    padding: '6px',
  },
  answer: {
    color: '#525f7f',
    fontStyle: 'italic' as const,
  },
};

export const QuestionBox = ({
  question,
  answer,
  selectedYears,
}: QuestionBoxProps): React.ReactElement => (
  <section>
    <form method="get" action="/">
      <input type="hidden" name="applied" value="true" />
      {selectedYears.map((year) => (
        <input key={year} type="hidden" name="year" value={String(year)} />
      ))}
      <input
        type="text"
        name="question"
        placeholder="Ask a question about the pledges"
        defaultValue={question}
        style={styles.input}
      />
      <button type="submit">Ask</button>
    </form>
    {answer !== '' && (
      <p id="question-answer" style={styles.answer}>
        {answer}
      </p>
    )}
  </section>
);
