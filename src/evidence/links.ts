import type { AnnotatorConfig } from '../config'

const HTML_ENTITIES: Record<string, string> = { '&': '&amp;', '<': '&lt;', '>': '&gt;', '"': '&quot;', "'": '&#x27;' }

export function escapeHtml(s: string) {
  return s.replace(/[&<>"']/g, (c) => HTML_ENTITIES[c] ?? c)
}

function anchor(url: string, label: string, cfg: AnnotatorConfig) {
  return `<a href="${url}" target="${cfg.browserTarget}">${label}</a>`
}

// Link to the statements of one type between subject and object
export function statementEvidenceLink(
  count: number | string,
  subject: string,
  object: string,
  stmtType: string,
  cfg: AnnotatorConfig
) {
  const url =
    `${cfg.statementUrl}/from_agents?subject=${escapeHtml(subject)}&object=${escapeHtml(object)}` +
    `&type=${escapeHtml(stmtType)}&format=html&expand_all=true`
  return anchor(url, String(count), cfg)
}

// Link to every statement involving both agents, in either role
export function allEvidenceLink(count: number, agent0: string, agent1: string, cfg: AnnotatorConfig) {
  const url = `${cfg.statementUrl}/from_agents?agent0=${escapeHtml(agent0)}&agent1=${escapeHtml(agent1)}&format=html&expand_all=false`
  return anchor(url, String(count), cfg)
}
