import {
  QuizQuestion,
  optionLetter,
} from '../../quiz/types/quiz-question.interface';

export function QuestionList({
  questions,
  selections = [],
}: {
  questions: QuizQuestion[];
  selections?: ReadonlyArray<number | undefined>;
}) {
  return (
    <ol>
      {questions.map((question, qIndex) => (
        <li key={question.id}>
          <fieldset role="radiogroup" aria-label={`Question ${question.id}`}>
            <legend>{question.prompt}</legend>
            {question.options.map((option, index) => (
              <label key={index}>
                <input
                  type="radio"
                  name={`answer-${question.id}`}
                  value={index}
                  defaultChecked={selections[qIndex] === index}
                />{' '}
                {optionLetter(index)}. {option}
              </label>
            ))}
          </fieldset>
        </li>
      ))}
    </ol>
  );
}
