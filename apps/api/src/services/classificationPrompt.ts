import { DEPARTMENTS } from '@ticket-triage/domain';
import type { Department, IncomingTicket } from '@ticket-triage/domain';

interface WorkedExample {
  title: string;
  description: string;
  department: Department;
  team: string;
  reasoning: string;
}

const EXAMPLES: WorkedExample[] = [
  {
    title: 'VPN connection issues after Windows update',
    description: 'Cannot connect to company VPN after latest Windows update. Getting timeout errors.',
    department: 'IT',
    team: 'network_team',
    reasoning: 'Network connectivity issue requiring IT support for VPN troubleshooting.',
  },
  {
    title: 'New employee onboarding documents',
    description: 'Need to complete I-9 forms and benefits enrollment for new hire starting Monday.',
    department: 'HR',
    team: 'hr_operations',
    reasoning: 'Employee onboarding and documentation handled by HR operations.',
  },
  {
    title: 'Conference room booking system not working',
    description: 'Meeting room reservation system is down, cannot book rooms for client meetings.',
    department: 'FACILITIES',
    team: 'facilities_management',
    reasoning: 'Office systems and meeting room management falls under facilities.',
  },
  {
    title: 'Expense report approval delayed',
    description: 'Submitted expense report 2 weeks ago but still pending approval in the system.',
    department: 'FINANCE',
    team: 'finance_team',
    reasoning: 'Expense management and approval processes are handled by finance.',
  },
  {
    title: 'Data privacy compliance question',
    description: 'Need guidance on GDPR compliance for customer data collection in new product.',
    department: 'LEGAL',
    team: 'compliance_team',
    reasoning: 'Privacy compliance and legal guidance required from legal team.',
  },
  {
    title: 'Suspicious email with potential malware',
    description: 'Received suspicious email with attachment, may be phishing attempt.',
    department: 'SECURITY',
    team: 'infosec_team',
    reasoning: 'Security incident requiring immediate attention from information security.',
  },
];

function formatExample(example: WorkedExample, index: number): string {
  return `Example ${index + 1}:
Title: ${example.title}
Description: ${example.description}
Classification:
- Department: ${example.department}
- Team: ${example.team}
- Reasoning: ${example.reasoning}
`;
}

/**
 * Few-shot prompt asking for a single JSON object with
 * department, team, confidence and reasoning.
 */
export function buildClassificationPrompt(ticket: IncomingTicket): string {
  return `You are an expert ticket classifier for a corporate environment.

Your task is to classify incoming tickets into the appropriate department and assign them to the most suitable team.

Available departments: ${DEPARTMENTS.join(', ')}

Here are examples of correct classifications:

${EXAMPLES.map(formatExample).join('\n')}
Now classify this ticket:

Title: ${ticket.title}
Description: ${ticket.description}
Priority: ${ticket.priority}
User Email: ${ticket.email}

Provide your classification in this exact JSON format:
{
    "department": "DEPARTMENT_NAME",
    "team": "specific_team_name",
    "confidence": 0.95,
    "reasoning": "Brief explanation of why this classification was chosen"
}

Important guidelines:
1. Be conservative with confidence scores (0.6-1.0 range)
2. Use GENERAL department only when no other department clearly fits
3. Consider the priority level when assigning teams
4. Base your decision on keywords, context, and business domain knowledge
5. Provide clear reasoning for your classification choice

Classification:`;
}
