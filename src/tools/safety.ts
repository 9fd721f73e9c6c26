// Command denylist - refused before approval is ever asked

export const FORBIDDEN_PATTERNS: Array<{ re: RegExp; reason: string }> = [
  // Recursive delete of / or everything under it, quoted or not
  {
    re: /\brm\s+(-{1,2}[a-z-]*\s+)*(-[a-z]*[rf][a-z]*|--recursive|--force)\s+(-{1,2}[a-z-]*\s+)*(["']?)\/+\*?\4(?=$|[\s;&|])/i,
    reason: 'rm targeting /',
  },
  { re: /--no-preserve-root\b/, reason: 'rm --no-preserve-root' },
  { re: /\brm\s+(-[a-z]+\s+)*-[a-z]*r[a-z]*\s+(~|\$HOME)\/?(?=$|[\s;&|])/i, reason: 'rm targeting home directory' },

  // Block device / partition destruction
  { re: /\bmkfs(\.\w+)?\b/, reason: 'mkfs (filesystem creation)' },
  { re: /\bdd\s+if=/, reason: 'dd raw copy' },
  { re: /\b(fdisk|parted|wipefs)\b/, reason: 'partition table modification' },
  { re: />\s*\/dev\/(sd|hd|nvme|vd)\w*/, reason: 'writing to a block device' },

  // Fork bomb
  { re: /:\s*\(\s*\)\s*\{\s*:\s*\|\s*:\s*&\s*\}\s*;\s*:/, reason: 'fork bomb' },
  { re: /fork bomb/i, reason: 'fork bomb' },

  // System shutdown/reboot
  { re: /\b(shutdown|reboot|poweroff|halt)\b/, reason: 'system shutdown/reboot' },
];

export function checkCommandSafety(command: string): { blocked: true; reason: string } | { blocked: false } {
  for (const { re, reason } of FORBIDDEN_PATTERNS) {
    if (re.test(command)) {
      return { blocked: true, reason };
    }
  }
  return { blocked: false };
}
