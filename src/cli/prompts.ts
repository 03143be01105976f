import * as clack from '@clack/prompts'

export async function askTaskName(): Promise<string | null> {
    const result = await clack.text({
        message: 'Task name:',
        placeholder: 'Write chapter 3',
        validate(value) {
            if (!value.trim()) return 'Task name cannot be empty'
        },
    })

    if (clack.isCancel(result)) return null
    return result
}

export function canPrompt(): boolean {
    return Boolean(process.stdin.isTTY && process.stdout.isTTY)
}
