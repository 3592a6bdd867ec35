import type { SenderProfile } from '../lib/config.js';
import { slugify } from './pattern-generator.js';
import type { JobProfile } from './types.js';

type Section = string | null;

export interface RenderedMessage {
  subject: string;
  body: string;
}

export function subjectFor(profile: JobProfile): string {
  return `Application for ${profile.job_title} Position`;
}

/** Target company whose name matches the recipient's mail domain, if any. */
export function companyForRecipient(profile: JobProfile, recipient: string): string | undefined {
  const labels = recipient.slice(recipient.indexOf('@') + 1).split('.');
  const registered = labels.length >= 2 ? labels[labels.length - 2] : labels[0];
  return profile.target_companies.find((company) => slugify(company) === registered);
}

function list(values: readonly string[]): string {
  return values.join(', ');
}

function experienceClause(profile: JobProfile): string {
  const level = profile.experience_level?.toLowerCase();
  const years = profile.experience_years;
  if (level && years) return `As a ${level}-level professional with ${years} of experience, `;
  if (level) return `As a ${level}-level professional, `;
  if (years) return `With ${years} of experience, `;
  return 'As a dedicated software professional, ';
}

function backgroundSection(profile: JobProfile): Section {
  const bullets: string[] = [];
  if (profile.required_skills.length > 0) bullets.push(`• Proficient in: ${list(profile.required_skills)}`);
  if (profile.preferred_skills.length > 0) {
    bullets.push(`• Additional experience with: ${list(profile.preferred_skills)}`);
  }
  bullets.push(
    '• Strong problem-solving skills and ability to work in agile environments',
    '• Passion for creating efficient, scalable solutions',
  );
  return [
    `${experienceClause(profile)}I am excited about the opportunity to contribute to your team. My background includes:`,
    ...bullets,
  ].join('\n');
}

function domainSection(profile: JobProfile): Section {
  if (profile.domains.length === 0) return null;
  return `My expertise spans ${list(profile.domains).toLowerCase()} development.`;
}

function interestSection(profile: JobProfile): Section {
  const parts: string[] = [];
  if (profile.industries.length > 0) {
    parts.push(`I am passionate about working in the ${list(profile.industries)} space.`);
  }
  if (profile.company_types.length > 0) {
    parts.push(`I am particularly interested in ${list(profile.company_types).toLowerCase()} companies.`);
  }
  return parts.length > 0 ? parts.join(' ') : null;
}

function locationSection(profile: JobProfile): Section {
  const hasLocations = profile.locations.length > 0;
  if (hasLocations && profile.remote_ok) {
    return `I am open to opportunities in ${list(profile.locations)} as well as remote positions.`;
  }
  if (hasLocations) {
    return `I am specifically interested in opportunities in ${list(profile.locations)}.`;
  }
  if (profile.remote_ok) return 'I am open to both on-site and remote opportunities.';
  return 'I am open to on-site opportunities wherever your team is based.';
}

function availabilitySection(profile: JobProfile): Section {
  const parts: string[] = [];
  if (profile.employment_type) {
    parts.push(`I am looking for a ${profile.employment_type.toLowerCase()} position.`);
  }
  if (profile.urgency.toLowerCase() === 'urgent') {
    parts.push('I am actively seeking new opportunities and available for immediate start.');
  }
  return parts.length > 0 ? parts.join(' ') : null;
}

function salarySection(profile: JobProfile): Section {
  return profile.salary_range ? `My salary expectation is in the range of ${profile.salary_range}.` : null;
}

function linksSection(sender: SenderProfile): Section {
  const links = [
    sender.resumeUrl && `• Resume: ${sender.resumeUrl}`,
    sender.githubUrl && `• GitHub: ${sender.githubUrl}`,
    sender.linkedinUrl && `• LinkedIn: ${sender.linkedinUrl}`,
  ].filter((line): line is string => Boolean(line));
  return links.length > 0 ? ['You can also find more about my work:', ...links].join('\n') : null;
}

/**
 * Joins the non-empty sections with exactly one blank line. Lines are
 * trimmed and blank lines inside a section dropped, so the body never has
 * consecutive or edge blank lines.
 */
export function joinSections(sections: readonly Section[]): string {
  return sections
    .map((section) =>
      (section ?? '')
        .split('\n')
        .map((line) => line.trim())
        .filter((line) => line.length > 0)
        .join('\n'),
    )
    .filter((section) => section.length > 0)
    .join('\n\n');
}

export function renderOutreachMessage(
  profile: JobProfile,
  recipient: string,
  sender: SenderProfile,
): RenderedMessage {
  const organization = companyForRecipient(profile, recipient) ?? 'your organization';

  const body = joinSections([
    'Dear Hiring Manager,',
    `I hope this email finds you well. I am writing to express my strong interest in the ${profile.job_title} position at ${organization}.`,
    backgroundSection(profile),
    domainSection(profile),
    interestSection(profile),
    locationSection(profile),
    availabilitySection(profile),
    salarySection(profile),
    'I would welcome the opportunity to discuss how my skills and enthusiasm can contribute to your team\'s success.',
    linksSection(sender),
    'Thank you for considering my application. I look forward to hearing from you.',
    ['Best regards,', sender.name, sender.email].join('\n'),
  ]);

  return { subject: subjectFor(profile), body };
}
