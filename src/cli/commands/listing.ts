import type { Container } from '../../core/container.js'
import { colors, formatListing, formatMeetup } from '../ui.js'

export async function listingShowCommand(container: Container): Promise<void> {
    const listing = await container.listing.load()
    if (!listing) {
        console.log(colors.warn(`No valid listing at ${container.listing.file}`))
        return
    }
    console.log(formatListing(listing))
}

export async function listingAvailCommand(container: Container, note: string): Promise<void> {
    const listing = await container.listing.setAvailability(note)
    console.log(colors.success(`Availability updated: ${listing.availabilityNote}`))
}

export async function meetupsCommand(container: Container): Promise<void> {
    const entries = await container.meetups.list()
    if (entries.length === 0) {
        console.log(colors.dim('No confirmed meetups.'))
        return
    }
    for (const entry of entries) console.log(formatMeetup(entry))
}
