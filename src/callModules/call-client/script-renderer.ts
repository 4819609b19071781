import type { Contact } from '../dispatcher/interface/campaign-dispatch.interface';
import type { ScriptConfig } from './schema/script-config.schema';

const PLACEHOLDER = /{{\s*([A-Za-z0-9_]+)\s*}}/g;

function variablesFor(contact: Contact): Map<string, string> {
  const vars = new Map<string, string>(Object.entries(contact.fields ?? {}));
  vars.set('id', contact.id);
  vars.set('displayName', contact.displayName);
  vars.set('clinicReference', contact.clinicReference);
  return vars;
}

/** Simple {{var}} substitution; unknown names render as empty strings. */
export function renderTemplate(body: string, vars: Map<string, string>): string {
  return body.replace(PLACEHOLDER, (_: string, key: string) => vars.get(key) ?? '');
}

export function renderScript(config: ScriptConfig, contact: Contact): ScriptConfig {
  const vars = variablesFor(contact);
  return {
    ...config,
    task: renderTemplate(config.task, vars),
    ...(config.firstSentence !== undefined && { firstSentence: renderTemplate(config.firstSentence, vars) }),
    ...(config.voicemailMessage !== undefined && {
      voicemailMessage: renderTemplate(config.voicemailMessage, vars),
    }),
  };
}
