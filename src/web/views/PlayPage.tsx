import type { QuizResponse } from '../../quiz/types/quiz-question.interface';
import { Layout } from './Layout';
import { QuestionList } from './QuestionList';

export function PlayPage({
  quiz,
  selections,
  notice,
}: {
  quiz: QuizResponse;
  selections?: ReadonlyArray<number | undefined>;
  notice?: string;
}) {
  return (
    <Layout title={quiz.title}>
      <h2>{quiz.title}</h2>
      <p>
        {quiz.questions.length} {quiz.difficulty} question(s) on {quiz.topic}
      </p>
      {notice ? <p className="notice">{notice}</p> : null}
      <form method="post" action="/results">
        <input type="hidden" name="quiz" value={JSON.stringify(quiz)} />
        <QuestionList questions={quiz.questions} selections={selections} />
        <button type="submit">Submit Quiz</button>
      </form>
    </Layout>
  );
}
