import { QUIZ_COUNT_CHOICES } from '../../quiz/dto/create-quiz.dto';
import { QUIZ_DIFFICULTIES } from '../../quiz/types/quiz-question.interface';
import { Layout } from './Layout';

export function HomePage() {
  return (
    <Layout title="Quiz Generator">
      <form method="post" action="/play">
        <fieldset>
          <label>
            Topic
            <input type="text" name="topic" required maxLength={200} />
          </label>
          <div role="radiogroup" aria-label="Difficulty">
            Difficulty
            {QUIZ_DIFFICULTIES.map((difficulty) => (
              <label key={difficulty}>
                <input
                  type="radio"
                  name="difficulty"
                  value={difficulty}
                  defaultChecked={difficulty === 'easy'}
                />{' '}
                {difficulty[0].toUpperCase() + difficulty.slice(1)}
              </label>
            ))}
          </div>
          <label>
            Number of questions
            <select name="count" defaultValue={String(QUIZ_COUNT_CHOICES[0])}>
              {QUIZ_COUNT_CHOICES.map((count) => (
                <option key={count} value={count}>
                  {count}
                </option>
              ))}
            </select>
          </label>
        </fieldset>
        <fieldset>
          <legend>Learner (optional)</legend>
          <label>
            Name
            <input type="text" name="name" maxLength={60} />
          </label>
          <label>
            Age
            <input type="number" name="age" min={3} max={120} />
          </label>
        </fieldset>
        <button type="submit">Generate Quiz</button>
      </form>
    </Layout>
  );
}
