import {
  QuizGrade,
  QuizResponse,
  optionLetter,
} from '../../quiz/types/quiz-question.interface';
import { Layout } from './Layout';

export function ResultsPage({
  quiz,
  grade,
}: {
  quiz: QuizResponse;
  grade: QuizGrade;
}) {
  const payload = JSON.stringify(quiz);

  return (
    <Layout title={`${quiz.title} results`}>
      <h2>{quiz.title}</h2>
      <p className="success">
        Your Score: {grade.score}/{grade.total} ({grade.percentage}%)
      </p>
      <progress max={grade.total} value={grade.score} />

      {grade.wrongAnswers.length > 0 ? (
        <section>
          <h3>Questions to Review</h3>
          {grade.wrongAnswers.map((item) => (
            <div className="review" key={item.questionId}>
              <p>
                <strong>Question {item.questionId}:</strong> {item.question}
              </p>
              <p className="error">Your Answer: {item.selected}</p>
              <p className="success">Correct Answer: {item.correct}</p>
              {item.explanation ? <p>Explanation: {item.explanation}</p> : null}
            </div>
          ))}
        </section>
      ) : (
        <p>Every answer is correct.</p>
      )}

      <section>
        <h3>Answer Key</h3>
        <ol>
          {quiz.questions.map((question) => (
            <li key={question.id}>
              {optionLetter(question.options.indexOf(question.answer))}.{' '}
              {question.answer}
            </li>
          ))}
        </ol>
      </section>

      <div className="actions">
        <form method="post" action="/download">
          <input type="hidden" name="quiz" value={payload} />
          <label>
            <input type="checkbox" name="includeAnswers" value="true" /> Include
            answer key
          </label>
          <button type="submit">Download Quiz PDF</button>
        </form>
        <form method="post" action="/retake">
          <input type="hidden" name="quiz" value={payload} />
          <button type="submit" className="secondary">
            Retake Quiz (Same Questions)
          </button>
        </form>
        <form method="get" action="/">
          <button type="submit" className="secondary">
            New Quiz
          </button>
        </form>
      </div>
    </Layout>
  );
}
