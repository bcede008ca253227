/**
 * Wire schemas for the peer protocol
 *
 * Responses from a remote peer are decoded through these. Unknown fields are
 * dropped; a missing or mistyped required field fails the decode.
 */

import { z } from 'zod';
import { FriendStatus } from '../../types/constants';
import type { DocContent, DocSummary, Friend, GalleryListing, NodeInfo } from '../../types/common';

const isoTime = z.string().datetime({ offset: true }).transform(value => Date.parse(value));

export const nodeInfoSchema = z
  .object({
    node: z.object({
      id: z.string().min(1),
      name: z.string(),
      host: z.string(),
      port: z.number().int().min(1).max(65535),
    }),
  })
  .transform(({ node }): NodeInfo => ({
    peerId: node.id,
    peerName: node.name,
    host: node.host,
    port: node.port,
  }));

export const galleryListingSchema = z
  .object({
    name: z.string().min(1),
    file_count: z.number().int().nonnegative(),
    files: z.array(z.string()),
  })
  .transform((gallery): GalleryListing => ({
    name: gallery.name,
    fileCount: gallery.file_count,
    files: gallery.files,
  }));

export const galleriesSchema = z
  .object({ galleries: z.array(galleryListingSchema) })
  .transform(body => body.galleries);

const docSummaryShape = {
  filename: z.string().min(1),
  gallery: z.string(),
  size: z.number().int().nonnegative(),
  modified_at: z.string(),
};

export const docsSchema = z
  .object({ docs: z.array(z.object(docSummaryShape)) })
  .transform(body =>
    body.docs.map((doc): DocSummary => ({
      filename: doc.filename,
      gallery: doc.gallery,
      size: doc.size,
      modifiedAt: doc.modified_at,
    }))
  );

export const docSchema = z
  .object({ doc: z.object({ ...docSummaryShape, content: z.string() }) })
  .transform(({ doc }): DocContent => ({
    filename: doc.filename,
    gallery: doc.gallery,
    size: doc.size,
    modifiedAt: doc.modified_at,
    content: doc.content,
  }));

export const friendSchema = z
  .object({
    peer_id: z.string().min(1),
    peer_name: z.string(),
    host: z.string(),
    port: z.number().int(),
    added_at: isoTime,
    last_seen: isoTime.nullable().optional(),
    is_online: z.boolean(),
    status: z.nativeEnum(FriendStatus),
  })
  .transform((friend): Friend => ({
    peerId: friend.peer_id,
    peerName: friend.peer_name,
    host: friend.host,
    port: friend.port,
    addedAt: friend.added_at,
    lastSeen: friend.last_seen ?? undefined,
    isOnline: friend.is_online,
    status: friend.status,
  }));

export const friendsSchema = z
  .object({ friends: z.array(friendSchema) })
  .transform(body => body.friends);
