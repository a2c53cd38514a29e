export const QUIZ_PROMPT_TEMPLATE = `You are an expert educational quiz creator. Generate a multiple-choice quiz
based EXCLUSIVELY on the following course content.

COURSE TITLE: {{title}}
DIFFICULTY LEVEL: {{difficulty}}
NUMBER OF QUESTIONS: {{questionCount}}

COURSE CONTENT:
{{context}}

REQUIREMENTS:
1. Each question must have exactly 4 answer options
2. Exactly ONE option must be correct
3. Questions must be derived ONLY from the provided content

Respond ONLY with one valid JSON object and no text before or after it:
{
  "questions": [
    {
      "question_text": "Question text",
      "options": [
        {"text": "Option A", "explanation": "Why correct/incorrect"},
        {"text": "Option B", "explanation": "Why correct/incorrect"},
        {"text": "Option C", "explanation": "Why correct/incorrect"},
        {"text": "Option D", "explanation": "Why correct/incorrect"}
      ],
      "correct_option_index": 0,
      "explanation": "Overall explanation",
      "source_context": "Source from content"
    }
  ]
}
`;

export const EVALUATION_PROMPT_TEMPLATE = `Evaluate quiz results: Score: {{scorePercentage}}%, Correct: {{correctAnswers}}/{{totalQuestions}}, Weak topics: {{weakTopics}}

Return JSON: {"feedback": "message", "strengths": [], "weaknesses": [],
"recommendations": [], "recommended_difficulty": "EASY|MEDIUM|HARD|EXPERT",
"course_validated": true/false}
`;
