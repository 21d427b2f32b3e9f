/**
 * Stage prompt templates
 * Placeholders: {{leadContext}} and {{priorStageOutput}}
 */

export const RESEARCH_TEMPLATE = `Research this business for a website outreach call.

{{leadContext}}

Summarize what the business does, who its customers are, how it presents itself online today,
and two or three concrete ways a better website would help it. Do not invent facts.`;

export const DRAFT_TEMPLATE = `Using the research below, draft a short website proposal for this business.

{{leadContext}}

Research:
{{priorStageOutput}}

Write a friendly, specific proposal of at most 200 words, with a clear next step.`;

export const REVIEW_TEMPLATE = `Review and tighten the proposal below. Remove any claim the research does not support
and keep it under 200 words. Return only the final proposal text.

{{leadContext}}

Draft:
{{priorStageOutput}}`;

export const CALL_SCRIPT_TEMPLATE = `You are calling a local business on behalf of a web agency.
Introduce yourself briefly, mention one specific observation about the business, and ask whether
the owner would like the proposal below sent by email. If they agree, confirm their email address.
Be polite and end the call quickly if they are not interested.

{{leadContext}}

Proposal:
{{priorStageOutput}}`;

export const CLASSIFY_TEMPLATE = `Classify the outcome of this sales call.

{{leadContext}}

Transcript:
{{priorStageOutput}}

Answer with a JSON object: {"call_category": one of "agreed_to_email", "interested", "not_interested",
"issue_appeared", "other"; "email": the email address the contact gave, or null; "note": one sentence}.`;

export const REPLY_ANALYSIS_TEMPLATE = `Analyze this reply from a prospect to our website proposal.

{{leadContext}}

Reply:
{{priorStageOutput}}

Answer with a JSON object: {"hot_lead": true if the prospect is clearly interested in buying,
"meeting_request": true if they ask for a call or meeting, "reason": one sentence}.`;
