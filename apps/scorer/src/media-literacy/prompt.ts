export const CONTENT_SAMPLE_CHARS = 2500

export const PATTERN_NAMES = [
  'scientific_mismatch',
  'extraordinary_claims',
  'statistical_manipulation',
  'expertise_mismatch',
  'conflict_of_interest',
  'historical_revisionism',
  'predatory_economic',
] as const

export function buildAnalysisPrompt(page: { title: string | null; domain: string; content: string }): string {
  const sample = page.content.slice(0, CONTENT_SAMPLE_CHARS)

  return `Analyze this webpage content for media literacy red flags.

CONTENT:
Title: ${page.title || 'No title'}
Domain: ${page.domain}
Text: ${sample}

Detect these 7 patterns:
1. Scientific Consensus Mismatch - contradicts established scientific consensus
2. Extraordinary Claims - miracle cures, extreme promises without evidence
3. Statistical Manipulation - correlation presented as causation, cherry-picked or misleading data
4. Source-Expertise Mismatch - unqualified author making expert claims
5. Conflict of Interest - undisclosed sponsorship, selling the promoted product
6. Historical Revisionism - contradicts the established historical record
7. Predatory Economic - MLM recruitment, pressure tactics, get-rich-quick schemes

Distinguish carefully:
- Reporting on violence or misinformation is not promoting it
- Academic or educational discussion is not advocacy
- Historical analysis is not revisionism
- Medical information from qualified sources is not a miracle-cure claim
- Explaining a conspiracy theory is not endorsing it

Return ONLY a JSON object (no markdown, no code fences):
{
  "major_red_flags": ["pattern_name"],
  "minor_concerns": ["pattern_name"],
  "explanation": "1-2 sentence reasoning",
  "credibility_score": 0-100,
  "context_box_needed": true or false,
  "context_box_text": "Context note for readers, if needed"
}

Pattern names: ${PATTERN_NAMES.join(', ')}

Academic and educational content should score 70 or higher. Genuine misinformation should score 0-40.`
}
