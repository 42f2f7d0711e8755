// Prompt templates for common research tasks

import { field } from '../schema.js';
import type { PromptDescriptor } from '../types.js';

export function createResearchPrompts(): PromptDescriptor[] {
  return [
    {
      kind: 'prompt',
      name: 'research-outline',
      description: 'Generate a research outline for a given topic',
      parameters: [
        field.string('topic', { description: 'The topic to outline', required: true })
      ],
      renderer: (input) => [
        {
          role: 'user',
          content: `Create a comprehensive research outline for the topic: "${input.string('topic')}"

The outline should include:
1. Main research question
2. Key subtopics to explore
3. Potential sources to investigate
4. Expected findings areas
5. Research methodology suggestions

Focus on creating a structured approach that will lead to a thorough understanding of the topic.`
        }
      ]
    },
    {
      kind: 'prompt',
      name: 'research-analysis',
      description: 'Analyze research findings and provide insights',
      parameters: [
        field.string('query', { description: 'The original research query', required: true }),
        field.string('findings', { description: 'The research findings to analyze', required: true })
      ],
      renderer: (input) => [
        {
          role: 'user',
          content: `Research Query: ${input.string('query')}

Research Findings:
${input.string('findings')}

Please provide:
1. Key insights and patterns
2. Contradictions or conflicting information
3. Gaps in the research
4. Recommendations for further investigation
5. Summary of the most important findings

Focus on critical analysis and actionable insights.`
        }
      ]
    }
  ];
}
