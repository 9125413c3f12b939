import { execa } from 'execa';

export async function git(args: string[], cwd: string) {
  return execa('git', args, { cwd });
}

/** Like {@link git}, but resolves to null when git fails or is not installed. */
export async function gitOptional(args: string[], cwd: string) {
  try {
    return await git(args, cwd);
  } catch {
    return null;
  }
}
