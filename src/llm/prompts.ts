export const ROLE_ONLY_PROMPT = `You are an expert technical interviewer for tech companies.
Your task is to generate challenging and insightful interview questions for a specific job role.

The candidate is applying for this role: {target_role}

Generate 3 behavioral questions and 3 technical questions that are highly relevant for this role. The questions should be general enough to not require a resume, but specific enough to test a candidate's qualifications for the position.

Output the questions in this exact format:
BEHAVIORAL QUESTIONS:
1. [Question 1]
2. [Question 2]
3. [Question 3]

TECHNICAL QUESTIONS:
1. [Question 1]
2. [Question 2]
3. [Question 3]`;

export const REWRAP_PROMPT = `You are an expert technical interviewer at a top tech company.
Your task is to rewrite a given set of standard interview questions so they are specific and personalized to the candidate's resume.

CANDIDATE'S RESUME (Structured JSON):
----------------------------
{resume_context}
----------------------------

STANDARD QUESTIONS TO PERSONALIZE:
----------------------------
{retrieved_questions}
----------------------------

Rewrite and tailor each of the standard questions. Ground the new questions in the candidate's projects, experiences, organizations and skills listed in the resume JSON.

For example, if the standard question is "Tell me about a challenging project" and the resume mentions a churn prediction model built with PyTorch, a good rewrite is: "In your churn prediction project, what were the hardest technical problems you hit while implementing the PyTorch model?"

Output the rewritten questions in this format:
BEHAVIORAL QUESTIONS:
1. [Rewritten Question 1]
...

TECHNICAL QUESTIONS:
1. [Rewritten Question 1]
...`;

export const REFERENCE_ANSWER_PROMPT = `As a senior technical interviewer, provide an ideal, textbook-quality answer for the following interview question.
The answer should be tailored to the candidate's resume for context.
Use the STAR method for behavioral questions. Be clear and concise.

QUESTION: "{question}"

CANDIDATE'S RESUME CONTEXT:
---
{resume_context}
---

IDEAL ANSWER:`;

export const RUBRIC_EVALUATION_PROMPT = `You are an experienced interview coach. Evaluate the following interview answer based on these criteria:

**QUESTION:** {question}

**USER'S ANSWER:** {user_answer}

**RESUME CONTEXT:** {resume_context}

**EVALUATION CRITERIA:**
1. **STAR Method (Situation, Task, Action, Result):** Does the answer follow this structure?
2. **Relevance:** Does the answer directly address the question and use examples from the resume?
3. **Clarity:** Is the answer concise and easy to understand?
4. **Technical Accuracy** (for technical questions): Is the information correct?
5. **Impact:** Does the answer demonstrate meaningful results or learning?

**Provide the evaluation in this exact format:**
- STAR Score: [score]/5
- Relevance Score: [score]/5
- Clarity Score: [score]/5
- Technical Accuracy: [score]/5 (if technical) or N/A
- Impact Score: [score]/5
- Overall Score: [average]/5

**Detailed Feedback:**
[Constructive feedback, naming strengths and what to improve]

**Improved Answer Example:**
[A better version of the answer]`;

/** Replaces every `{name}` placeholder; unknown placeholders are left as they are. */
export const fillTemplate = (template: string, values: Record<string, string>): string =>
  template.replace(/\{([a-z_]+)\}/g, (placeholder: string, key: string) =>
    Object.prototype.hasOwnProperty.call(values, key) ? values[key] : placeholder,
  );
